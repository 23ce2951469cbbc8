import { DocumentInputSchema } from "../types/document";
import { describeError } from "./describe-error";
import { filenameToTitle } from "./filename-to-title";
import { normalizeSourcePath } from "./link-registry";
import type {
  DocumentInput,
  DocumentOutput,
  DocumentRecord,
  FailureReason,
} from "../types";

/**
 * Order documents by normalized source path (code unit order, locale independent)
 */
export function compareSourcePaths(a: string, b: string): number {
  const left = normalizeSourcePath(a);
  const right = normalizeSourcePath(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Create the pending record for an extracted document
 * Throws a ZodError when the input does not validate.
 */
export function createRecord(input: DocumentInput): DocumentRecord {
  const valid = DocumentInputSchema.parse(input);
  const title = valid.title?.trim() || filenameToTitle(valid.sourcePath) || "Untitled";

  return {
    sourcePath: valid.sourcePath,
    input: valid,
    title,
    converter: valid.converter ?? "unknown",
    blocks: [],
    diagnostics: {
      warnings: [...valid.warnings],
      errors: [...valid.errors],
      specialCase: valid.specialCase,
    },
    status: "pending",
    headingTree: [],
    slugTable: {},
    assets: [],
    qualityScore: 0,
    durationMs: 0,
  };
}

/**
 * Create the failed record for an input that did not validate
 * The source path is kept when it is usable, otherwise fallbackPath stands in.
 */
export function createRejectedRecord(
  input: unknown,
  fallbackPath: string,
  error: unknown,
): DocumentRecord {
  const sourcePath =
    typeof input === "object" &&
    input !== null &&
    "sourcePath" in input &&
    typeof input.sourcePath === "string" &&
    input.sourcePath.length > 0
      ? input.sourcePath
      : fallbackPath;

  return {
    sourcePath,
    title: filenameToTitle(sourcePath) || "Untitled",
    converter: "unknown",
    blocks: [],
    diagnostics: { warnings: [], errors: [describeError(error)] },
    status: "failed",
    failureReason: "processing-error",
    headingTree: [],
    slugTable: {},
    assets: [],
    qualityScore: 0,
    durationMs: 0,
  };
}

/**
 * Move a document to its terminal failed state
 * A failed document has no output path and scores 0.
 */
export function failDocument(
  doc: DocumentRecord,
  reason: FailureReason,
  message?: string,
): void {
  doc.status = "failed";
  doc.failureReason = reason;
  doc.outputPath = undefined;
  doc.qualityScore = 0;

  if (message && !doc.diagnostics.errors.includes(message)) {
    doc.diagnostics.errors.push(message);
  }
}

/**
 * Per-document result for the packaging step
 */
export function toDocumentOutput(doc: DocumentRecord): DocumentOutput {
  return {
    sourcePath: doc.sourcePath,
    outputPath: doc.status === "failed" ? null : (doc.outputPath ?? null),
    title: doc.title,
    blocks: doc.blocks,
    assets: doc.assets,
    headingTree: doc.headingTree,
    qualityScore: doc.qualityScore,
    warnings: [...doc.diagnostics.warnings],
    errors: [...doc.diagnostics.errors],
    status: doc.status,
  };
}
