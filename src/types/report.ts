/**
 * Batch report types
 *
 * BatchReport is the in-memory shape; SerializedBatchReport is the JSON
 * consumed by the reporting UI and must keep its field names and nesting.
 */

import type { DocumentStatus, FailureReason } from "./document";

export interface DocumentSummary {
  sourcePath: string;
  outputPath: string | null;
  success: boolean;
  status: DocumentStatus;
  failureReason?: FailureReason;
  warnings: string[];
  errors: string[];
  qualityScore: number;
  converter: string;
  durationMs: number;
}

export interface BatchReport {
  startTime: Date;
  endTime: Date;
  total: number;
  successful: number;
  failed: number;
  averageQualityScore: number;
  documents: DocumentSummary[];
}

export interface SerializedFileReport {
  source_file: string;
  output_file: string | null;
  success: boolean;
  warnings: string[];
  errors: string[];
  quality_score: number;
  converter_used: string;
  conversion_time_ms: number;
}

export interface SerializedBatchReport {
  start_time: string;
  end_time: string | null;
  total_files: number;
  successful: number;
  failed: number;
  files: SerializedFileReport[];
  average_quality_score: number;
}
