/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  BatchConfig,
  HeadingsConfig,
  AssetsConfig,
  LinksConfig,
  QualityConfig,
  MarkdownConfig,
  ReportConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Blocks
export type {
  TextRun,
  LinkRun,
  InlineRun,
  HeadingLevel,
  HeadingBlock,
  ParagraphBlock,
  ImageBlock,
  LinkBlock,
  TableBlock,
  Block,
  BlockKind,
  LinkLike,
} from "./blocks";
export { BlockSchema, InlineRunSchema, assertNever } from "./blocks";

// Documents
export type {
  SpecialCase,
  DocumentInput,
  ValidDocumentInput,
  DocumentStatus,
  FailureReason,
  Diagnostics,
  HeadingEntry,
  SlugTable,
  AssetFile,
  DocumentRecord,
  DocumentOutput,
} from "./document";
export { DocumentInputSchema, SpecialCaseSchema } from "./document";

// Report
export type {
  DocumentSummary,
  BatchReport,
  SerializedFileReport,
  SerializedBatchReport,
} from "./report";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  DocumentIssue,
  LinkIssue,
  ResourceIssue,
  DocumentIssueReason,
  LinkIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Resolver
export type { LinkSource, LinkResolutionResult } from "./resolver";
