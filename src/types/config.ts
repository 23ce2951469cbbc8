/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.string(); // Directory containing *.ir.json files

export const OutputConfigSchema = z.string(); // Output directory (docs root)

export const BatchConfigSchema = z.object({
  concurrency: z.number().int().positive(),
});

export const HeadingsConfigSchema = z.object({
  maxSlugLength: z.number().int().positive(),
});

export const AssetsConfigSchema = z.object({
  directory: z.string().min(1), // Relative to the output root (default: "assets")
  sequenceWidth: z.number().int().positive(), // Zero padding of image numbers
  defaultExtension: z.string().min(1), // Used when an image reference has no extension
});

export const LinksConfigSchema = z.object({
  resolveInternal: z.boolean(),
  // Caps fuzzy anchor matching (1 = exact slug only, 12 = every strategy)
  maxMatchStep: z.number().int().min(1).max(12).optional(),
});

export const QualityConfigSchema = z.object({
  warningPenalty: z.number().min(0).max(1),
  errorPenalty: z.number().min(0).max(1),
  scannedNoOcrScore: z.number().min(0).max(1),
  scannedWithOcrScore: z.number().min(0).max(1),
});

export const MarkdownConfigSchema = z.object({
  frontMatter: z.boolean(),
  headingIds: z.boolean(), // Emit {#slug} attribute lists after headings
  fileTemplate: z.string().nullable(), // Custom Handlebars page template (null = built-in)
  emphasis: z.enum(["_", "*"]),
  strong: z.enum(["__", "**"]),
});

export const ReportConfigSchema = z.object({
  filename: z.string().min(1),
  mkdocsNav: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  batch: BatchConfigSchema,
  headings: HeadingsConfigSchema,
  assets: AssetsConfigSchema,
  links: LinksConfigSchema,
  quality: QualityConfigSchema,
  markdown: MarkdownConfigSchema,
  report: ReportConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema =
  ConversionConfigSchema.partial().extend({
    batch: BatchConfigSchema.partial().optional(),
    headings: HeadingsConfigSchema.partial().optional(),
    assets: AssetsConfigSchema.partial().optional(),
    links: LinksConfigSchema.partial().optional(),
    quality: QualityConfigSchema.partial().optional(),
    markdown: MarkdownConfigSchema.partial().optional(),
    report: ReportConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type HeadingsConfig = z.infer<typeof HeadingsConfigSchema>;
export type AssetsConfig = z.infer<typeof AssetsConfigSchema>;
export type LinksConfig = z.infer<typeof LinksConfigSchema>;
export type QualityConfig = z.infer<typeof QualityConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<typeof PartialConversionConfigSchema>;
