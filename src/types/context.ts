/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { DocumentInput, DocumentRecord } from "./document";
import type { BatchReport } from "./report";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { FilenameRegistry } from "../utils/filename-registry";
import type { LinkRegistry } from "../utils/link-registry";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  DocumentIssue,
  LinkIssue,
  ResourceIssue,
  DocumentIssueReason,
  LinkIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  tracker: Tracker;
  logger: Logger;
  startTime: Date;
  signal?: AbortSignal;

  // Batch-scoped registries, sealed at the phase barrier
  filenames: FilenameRegistry;
  links: LinkRegistry;

  inputs?: DocumentInput[]; // Scanner output (or caller-provided documents)
  documents?: DocumentRecord[]; // One record per input, ordered by source path
  report?: BatchReport;
}
