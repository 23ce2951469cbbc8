/**
 * Report Module
 * Aggregates per-document results into the batch report and its JSON form
 */

import { compareSourcePaths } from "../utils";
import type {
  BatchReport,
  ConversionContext,
  DocumentRecord,
  DocumentSummary,
  SerializedBatchReport,
} from "../types";

export interface ReportTiming {
  startTime: Date;
  endTime: Date;
}

function summarize(doc: DocumentRecord): DocumentSummary {
  return {
    sourcePath: doc.sourcePath,
    outputPath: doc.status === "failed" ? null : (doc.outputPath ?? null),
    success: doc.status === "resolved",
    status: doc.status,
    failureReason: doc.failureReason,
    warnings: [...doc.diagnostics.warnings],
    errors: [...doc.diagnostics.errors],
    qualityScore: doc.qualityScore,
    converter: doc.converter,
    durationMs: doc.durationMs,
  };
}

/**
 * Build the batch report
 * The average covers every document; failed ones contribute 0.
 *
 * @example
 * // 4 resolved documents scoring 0.95 and 1 failed
 * buildBatchReport(documents, timing).averageQualityScore // 0.76
 */
export function buildBatchReport(
  documents: readonly DocumentRecord[],
  timing: ReportTiming,
): BatchReport {
  const summaries = documents
    .map(summarize)
    .sort((a, b) => compareSourcePaths(a.sourcePath, b.sourcePath));

  const successful = summaries.filter((doc) => doc.success).length;
  const total = summaries.reduce((sum, doc) => sum + doc.qualityScore, 0);
  const average = summaries.length > 0 ? total / summaries.length : 0;

  return {
    startTime: timing.startTime,
    endTime: timing.endTime,
    total: summaries.length,
    successful,
    failed: summaries.length - successful,
    averageQualityScore: Math.round(average * 10000) / 10000,
    documents: summaries,
  };
}

/**
 * JSON shape consumed by the reporting UI (field names and order are fixed)
 */
export function serializeReport(report: BatchReport): SerializedBatchReport {
  return {
    start_time: report.startTime.toISOString(),
    end_time: report.endTime.toISOString(),
    total_files: report.total,
    successful: report.successful,
    failed: report.failed,
    files: report.documents.map((doc) => ({
      source_file: doc.sourcePath,
      output_file: doc.outputPath,
      success: doc.success,
      warnings: doc.warnings,
      errors: doc.errors,
      quality_score: doc.qualityScore,
      converter_used: doc.converter,
      conversion_time_ms: doc.durationMs,
    })),
    average_quality_score: report.averageQualityScore,
  };
}

/**
 * Pipeline step: store the report on the context
 */
export function report(ctx: ConversionContext): void {
  if (!ctx.documents) {
    throw new Error("Processor must run before report");
  }

  ctx.report = buildBatchReport(ctx.documents, {
    startTime: ctx.startTime,
    endTime: new Date(),
  });
}
