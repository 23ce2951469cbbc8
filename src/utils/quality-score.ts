import type { Diagnostics, QualityConfig } from "../types";

export const DEFAULT_QUALITY_WEIGHTS: QualityConfig = {
  warningPenalty: 0.05,
  errorPenalty: 0.2,
  scannedNoOcrScore: 0.3,
  scannedWithOcrScore: 0.6,
};

/**
 * Score a document's conversion fidelity from its diagnostics
 * Scanned documents have a fixed score regardless of warnings and errors.
 *
 * @example
 * computeQualityScore({ warnings: ["w"], errors: [] }) // 0.95
 * computeQualityScore({ warnings: [], errors: [], specialCase: "scanned-no-ocr" }) // 0.3
 */
export function computeQualityScore(
  diagnostics: Diagnostics,
  weights: QualityConfig = DEFAULT_QUALITY_WEIGHTS,
): number {
  switch (diagnostics.specialCase) {
    case "scanned-no-ocr":
      return weights.scannedNoOcrScore;
    case "scanned-with-ocr":
      return weights.scannedWithOcrScore;
    case undefined:
      break;
  }

  const raw =
    1 -
    weights.warningPenalty * diagnostics.warnings.length -
    weights.errorPenalty * diagnostics.errors.length;

  // Round away floating-point residue (1 - 0.05 * 3 = 0.8499999999999999)
  return Math.round(Math.min(1, Math.max(0, raw)) * 10000) / 10000;
}
