/**
 * Scorer Module
 * Assigns the final quality score once a document has reached a terminal state
 */

import { computeQualityScore } from "../utils";
import type { ConversionContext } from "../types";

export function score(ctx: ConversionContext): void {
  if (!ctx.documents) {
    throw new Error("Processor must run before scorer");
  }

  const weights = ctx.config.quality;

  for (const doc of ctx.documents) {
    doc.qualityScore =
      doc.status === "resolved"
        ? computeQualityScore(doc.diagnostics, weights)
        : 0;
  }
}
