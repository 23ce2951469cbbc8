/**
 * Intermediate representation (IR) block types with Zod schemas
 * Produced by format-specific extraction, consumed by the normalization core
 */

import { z } from "zod";

// ============================================================================
// Inline runs
// ============================================================================

export const TextRunSchema = z.object({
  kind: z.literal("text"),
  text: z.string(),
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
  code: z.boolean().optional(),
});

export const LinkRunSchema = z.object({
  kind: z.literal("link"),
  targetRef: z.string(),
  displayText: z.string(),
  anchor: z.string().optional(),
  resolved: z.boolean().default(false),
});

export const InlineRunSchema = z.discriminatedUnion("kind", [
  TextRunSchema,
  LinkRunSchema,
]);

// ============================================================================
// Blocks
// ============================================================================

export const HeadingLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);

export const HeadingBlockSchema = z.object({
  kind: z.literal("heading"),
  level: HeadingLevelSchema,
  text: z.string(),
  id: z.string().optional(), // Final slug, assigned by the heading normalizer
});

export const ParagraphBlockSchema = z.object({
  kind: z.literal("paragraph"),
  runs: z.array(InlineRunSchema),
});

export const ImageBlockSchema = z.object({
  kind: z.literal("image"),
  sourceRef: z.string(),
  altText: z.string().default(""),
  assignedPath: z.string().optional(), // Set by the asset relocator
});

export const LinkBlockSchema = z.object({
  kind: z.literal("link"),
  targetRef: z.string(),
  displayText: z.string(),
  anchor: z.string().optional(),
  resolved: z.boolean().default(false),
});

export const TableBlockSchema = z.object({
  kind: z.literal("table"),
  rows: z.array(z.array(z.string())),
});

export const BlockSchema = z.discriminatedUnion("kind", [
  HeadingBlockSchema,
  ParagraphBlockSchema,
  ImageBlockSchema,
  LinkBlockSchema,
  TableBlockSchema,
]);

export type TextRun = z.infer<typeof TextRunSchema>;
export type LinkRun = z.infer<typeof LinkRunSchema>;
export type InlineRun = z.infer<typeof InlineRunSchema>;
export type HeadingLevel = z.infer<typeof HeadingLevelSchema>;
export type HeadingBlock = z.infer<typeof HeadingBlockSchema>;
export type ParagraphBlock = z.infer<typeof ParagraphBlockSchema>;
export type ImageBlock = z.infer<typeof ImageBlockSchema>;
export type LinkBlock = z.infer<typeof LinkBlockSchema>;
export type TableBlock = z.infer<typeof TableBlockSchema>;
export type Block = z.infer<typeof BlockSchema>;
export type BlockKind = Block["kind"];

/**
 * Anything that carries a link target: link blocks and inline link runs
 */
export type LinkLike = LinkBlock | LinkRun;

/**
 * Exhaustiveness guard for switches over closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}
