/**
 * Converter - Pipeline orchestrator
 * Coordinates the two-phase batch with zero business logic:
 * Phase 1 (per document) → barrier → Phase 2 (per document) → score → report
 */

import type {
  BatchReport,
  ConversionConfig,
  ConversionContext,
  DocumentInput,
  DocumentOutput,
  ProcessingStats,
} from "./types";
import * as modules from "./modules";
import {
  FilenameRegistry,
  LinkRegistry,
  Logger,
  Tracker,
  toDocumentOutput,
} from "./utils";

export type ConversionStep = "scan" | "process" | "resolve" | "write";

export interface ConverterOptions {
  logger?: Logger;
  tracker?: Tracker;
  onStep?: (step: ConversionStep) => void; // Progress reporting (e.g., a spinner)
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ConversionResult {
  documents: DocumentOutput[]; // Ordered by source path
  report: BatchReport;
  stats: ProcessingStats;
}

export class Converter {
  private logger: Logger;
  private tracker: Tracker;
  private onStep: (step: ConversionStep) => void;

  constructor(
    private config: ConversionConfig,
    options: ConverterOptions = {},
  ) {
    this.logger = options.logger ?? new Logger(config.logging.level);
    this.tracker = options.tracker ?? new Tracker();
    this.onStep = options.onStep ?? (() => {});
  }

  /**
   * Normalize a batch of extracted documents in memory
   * Performs no file-system I/O; the batch never throws for a single bad document.
   */
  async run(
    inputs: readonly DocumentInput[],
    options: RunOptions = {},
  ): Promise<ConversionResult> {
    const ctx = this.createContext(options.signal);
    ctx.inputs = [...inputs];

    await this.execute(ctx);
    return this.result(ctx);
  }

  /**
   * Convert the configured input directory into the output directory
   * scan → run → write
   */
  async convert(options: RunOptions = {}): Promise<ConversionResult> {
    const ctx = this.createContext(options.signal);

    this.onStep("scan");
    await modules.scan(ctx);
    await this.execute(ctx);
    this.onStep("write");
    await modules.write(ctx);

    return this.result(ctx);
  }

  private createContext(signal?: AbortSignal): ConversionContext {
    return {
      config: this.config,
      tracker: this.tracker,
      logger: this.logger,
      startTime: new Date(),
      signal,
      filenames: new FilenameRegistry(),
      links: new LinkRegistry(),
    };
  }

  private async execute(ctx: ConversionContext): Promise<void> {
    this.onStep("process");
    await modules.process(ctx);

    // Barrier: every Phase 1 task has settled
    ctx.filenames.seal();
    ctx.links.seal();

    if (ctx.signal?.aborted) {
      for (const doc of ctx.documents ?? []) {
        if (doc.status === "phase1-done") modules.cancelDocument(doc, ctx);
      }
      this.logger.warn("Conversion cancelled before link resolution");
    } else {
      this.onStep("resolve");
      await modules.resolve(ctx);
    }

    modules.score(ctx);
    modules.report(ctx);
  }

  private result(ctx: ConversionContext): ConversionResult {
    if (!ctx.report || !ctx.documents) {
      throw new Error("Report module failed to populate the batch report");
    }

    return {
      documents: ctx.documents.map(toDocumentOutput),
      report: ctx.report,
      stats: this.tracker.getStats(),
    };
  }
}
