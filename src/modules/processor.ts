/**
 * Processor Module (Phase 1)
 * Validates each document, assigns its unique output name, normalizes headings,
 * relocates assets and publishes the document to the link registry.
 * Links are left untouched until every document has finished this phase.
 */

import {
  compareSourcePaths,
  createRecord,
  createRejectedRecord,
  describeError,
  failDocument,
  normalizeHeadings,
  normalizeSourcePath,
  relocateAssets,
  runPool,
} from "../utils";
import type { ConversionContext, DocumentRecord } from "../types";

// ============================================================================
// Main Processor Function
// ============================================================================

export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.inputs) {
    throw new Error("Scanner must run before processor");
  }

  const { config, tracker, logger } = ctx;

  // A document that does not validate fails on its own; the batch carries on
  const rejected = new Map<DocumentRecord, unknown>();
  const documents = ctx.inputs
    .map((input, index) => {
      try {
        return createRecord(input);
      } catch (error) {
        const doc = createRejectedRecord(input, `input-${index + 1}`, error);
        rejected.set(doc, error);
        return doc;
      }
    })
    // Sorted so that name assignment follows source path order
    .sort((a, b) => compareSourcePaths(a.sourcePath, b.sourcePath));

  ctx.documents = documents;
  tracker.setTotalDocuments(documents.length);

  // A source path is the batch key; later copies fail before doing any work
  const seen = new Set<string>();
  for (const doc of documents) {
    if (rejected.has(doc)) {
      const error = rejected.get(doc);
      tracker.trackDocumentError(doc.sourcePath, error);
      tracker.incrementFailed();
      logger.warn(`Rejected ${doc.sourcePath}: ${describeError(error)}`);
      continue;
    }

    const key = normalizeSourcePath(doc.sourcePath);
    if (seen.has(key)) {
      const error = new Error(`duplicate source path: ${doc.sourcePath}`);
      failDocument(doc, "processing-error", error.message);
      tracker.trackDocumentError(doc.sourcePath, error);
      tracker.incrementFailed();
    }
    seen.add(key);
  }

  const pending = documents.filter((doc) => doc.status === "pending");
  logger.debug(
    `Phase 1: ${pending.length} document(s), concurrency ${config.batch.concurrency}`,
  );

  const { notStarted } = await runPool(
    pending,
    config.batch.concurrency,
    (doc) => processDocument(doc, ctx),
    ctx.signal,
  );

  for (const doc of notStarted) {
    cancelDocument(doc, ctx);
  }
}

// ============================================================================
// Per-document processing
// ============================================================================

/**
 * Run Phase 1 for one document
 * Never throws: any failure is recorded on the document and siblings carry on.
 */
export async function processDocument(
  doc: DocumentRecord,
  ctx: ConversionContext,
): Promise<void> {
  const { config, tracker, logger, filenames, links } = ctx;
  const started = Date.now();

  try {
    const { input } = doc;
    if (!input) {
      throw new Error(`Cannot process rejected input ${doc.sourcePath}`);
    }

    if (!input.success) {
      const details = doc.diagnostics.errors.join("; ") || "extraction failed";
      failDocument(
        doc,
        "extraction-failed",
        doc.diagnostics.errors.length === 0 ? details : undefined,
      );
      tracker.trackExtractionFailure(doc.sourcePath, details);
      tracker.incrementFailed();
      logger.warn(`Extraction failed: ${doc.sourcePath}`);
      return;
    }

    // Synchronous up to the name assignment, which keeps assignment order
    const name = await filenames.assign(doc.title);
    const outputPath = `${name}.md`;
    doc.outputPath = outputPath;

    const headings = normalizeHeadings(input.blocks, {
      title: doc.title,
      maxSlugLength: config.headings.maxSlugLength,
    });

    const relocated = relocateAssets(headings.blocks, input.rawAssets, {
      documentSlug: name,
      directory: config.assets.directory,
      sequenceWidth: config.assets.sequenceWidth,
      defaultExtension: config.assets.defaultExtension,
    });

    doc.blocks = relocated.blocks;
    doc.headingTree = headings.headingTree;
    doc.slugTable = headings.slugTable;
    doc.assets = relocated.assets;
    doc.diagnostics.warnings.push(...headings.warnings, ...relocated.warnings);

    tracker.addRelocatedImages(relocated.assets.length);
    tracker.addMissingImages(relocated.missing.length);

    await links.publish({
      sourcePath: doc.sourcePath,
      outputPath,
      slugTable: doc.slugTable,
      slugs: doc.headingTree.map((heading) => heading.slug),
    });

    doc.status = "phase1-done";
    logger.debug(`Processed ${doc.sourcePath} → ${outputPath}`);
  } catch (error) {
    failDocument(doc, "processing-error", describeError(error));
    tracker.trackDocumentError(doc.sourcePath, error);
    tracker.incrementFailed();
    logger.warn(`Failed to process ${doc.sourcePath}: ${describeError(error)}`);
  } finally {
    doc.durationMs += Date.now() - started;
  }
}

/**
 * Mark a document whose next phase never started as cancelled
 */
export function cancelDocument(
  doc: DocumentRecord,
  ctx: ConversionContext,
): void {
  failDocument(doc, "cancelled", "cancelled");
  ctx.tracker.trackCancelled(doc.sourcePath);
  ctx.tracker.incrementFailed();
}
