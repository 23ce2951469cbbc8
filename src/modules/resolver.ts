/**
 * Resolver Module (Phase 2)
 * Rewrites internal links of every Phase 1 document against the sealed link registry
 *
 * This module runs AFTER every document has settled Phase 1.
 */

import { LinkResolver, describeError, failDocument, runPool } from "../utils";
import { cancelDocument } from "./processor";
import type {
  Block,
  ConversionContext,
  DocumentRecord,
  InlineRun,
  LinkSource,
} from "../types";

// ============================================================================
// Main Resolver Function
// ============================================================================

/**
 * Resolves cross-references in all processed documents
 */
export async function resolve(ctx: ConversionContext): Promise<void> {
  if (!ctx.documents) {
    throw new Error("Processor must run before resolver");
  }

  const { config, logger } = ctx;
  const linkResolver = new LinkResolver(ctx);
  const ready = ctx.documents.filter((doc) => doc.status === "phase1-done");

  logger.debug(`Phase 2: ${ready.length} document(s)`);

  const { notStarted } = await runPool(
    ready,
    config.batch.concurrency,
    async (doc) => resolveDocument(doc, ctx, linkResolver),
    ctx.signal,
  );

  for (const doc of notStarted) {
    cancelDocument(doc, ctx);
  }
}

// ============================================================================
// Per-document resolution
// ============================================================================

/**
 * Run Phase 2 for one document
 * Unresolvable links only add warnings; the document still ends up resolved.
 */
export function resolveDocument(
  doc: DocumentRecord,
  ctx: ConversionContext,
  linkResolver: LinkResolver = new LinkResolver(ctx),
): void {
  const { tracker, logger } = ctx;
  const started = Date.now();

  try {
    if (doc.status !== "phase1-done" || !doc.outputPath) {
      throw new Error(`Cannot resolve links of a ${doc.status} document`);
    }

    const source: LinkSource = {
      sourcePath: doc.sourcePath,
      outputPath: doc.outputPath,
      slugTable: doc.slugTable,
      slugs: doc.headingTree.map((heading) => heading.slug),
    };
    const warnings: string[] = [];

    const resolveRun = (run: InlineRun): InlineRun => {
      if (run.kind !== "link") return run;
      const result = linkResolver.resolve(run, source);
      if (result.warning) warnings.push(result.warning);
      return result.link;
    };

    doc.blocks = doc.blocks.map((block): Block => {
      switch (block.kind) {
        case "link": {
          const result = linkResolver.resolve(block, source);
          if (result.warning) warnings.push(result.warning);
          return result.link;
        }
        case "paragraph":
          return { ...block, runs: block.runs.map(resolveRun) };
        default:
          return block;
      }
    });

    doc.diagnostics.warnings.push(...warnings);
    doc.status = "resolved";
    tracker.incrementResolved();
  } catch (error) {
    failDocument(doc, "processing-error", describeError(error));
    tracker.trackDocumentError(doc.sourcePath, error);
    tracker.incrementFailed();
    logger.warn(`Failed to resolve ${doc.sourcePath}: ${describeError(error)}`);
  } finally {
    doc.durationMs += Date.now() - started;
  }
}
