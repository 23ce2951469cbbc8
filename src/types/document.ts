/**
 * Document-related type definitions
 */

import { z } from "zod";
import { BlockSchema } from "./blocks";
import type { Block, HeadingLevel } from "./blocks";

// ============================================================================
// Extraction input
// ============================================================================

export const SpecialCaseSchema = z.enum(["scanned-no-ocr", "scanned-with-ocr"]);

/**
 * One document as handed over by the extraction collaborator
 * rawAssets maps an image's sourceRef to its extracted bytes
 */
export const DocumentInputSchema = z.object({
  sourcePath: z.string().min(1),
  title: z.string().optional(), // Extractor metadata title, if any
  converter: z.string().optional(), // Name of the extractor that produced the IR
  success: z.boolean().default(true), // False when extraction itself failed
  blocks: z.array(BlockSchema),
  rawAssets: z
    .record(
      z.string(),
      z.custom<Uint8Array>((value) => value instanceof Uint8Array, "expected image bytes"),
    )
    .default({}),
  specialCase: SpecialCaseSchema.optional(),
  warnings: z.array(z.string()).default([]),
  errors: z.array(z.string()).default([]),
});

export type SpecialCase = z.infer<typeof SpecialCaseSchema>;
export type DocumentInput = z.input<typeof DocumentInputSchema>;
export type ValidDocumentInput = z.output<typeof DocumentInputSchema>;

// ============================================================================
// Document lifecycle
// ============================================================================

export type DocumentStatus = "pending" | "phase1-done" | "resolved" | "failed";

export type FailureReason = "processing-error" | "extraction-failed" | "cancelled";

export interface Diagnostics {
  warnings: string[];
  errors: string[];
  specialCase?: SpecialCase;
}

export interface HeadingEntry {
  level: HeadingLevel;
  slug: string;
  text: string;
}

/**
 * Maps heading text to the final slug of its first occurrence
 * Example: { "Install Steps": "install-steps" }
 */
export type SlugTable = Record<string, string>;

export interface AssetFile {
  path: string; // e.g., "assets/user-guide/001.png"
  bytes: Uint8Array;
}

export interface DocumentRecord {
  // Set when the document enters the batch:
  sourcePath: string;
  input?: ValidDocumentInput; // Missing when the input was rejected
  title: string;
  converter: string;
  blocks: Block[];
  diagnostics: Diagnostics;
  status: DocumentStatus;

  // Phase 1 fills these fields:
  outputPath?: string; // e.g., "user-guide.md"
  headingTree: HeadingEntry[];
  slugTable: SlugTable;
  assets: AssetFile[];

  // Filled on completion:
  qualityScore: number;
  failureReason?: FailureReason;
  durationMs: number;
}

/**
 * Per-document result handed to the packaging collaborator
 */
export interface DocumentOutput {
  sourcePath: string;
  outputPath: string | null;
  title: string;
  blocks: Block[];
  assets: AssetFile[];
  headingTree: HeadingEntry[];
  qualityScore: number;
  warnings: string[];
  errors: string[];
  status: DocumentStatus;
}
