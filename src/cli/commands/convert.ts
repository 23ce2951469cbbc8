/**
 * Convert command - Loads config and runs conversion pipeline
 */

import ora from "ora";
import { z } from "zod";
import { Converter } from "../../converter";
import type { ConversionStep } from "../../converter";
import { loadConfig, Logger, Tracker } from "../../utils";
import * as modules from "../../modules";

const ConvertOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  frontMatter: z.boolean().optional(),
  mkdocsNav: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ConvertOptionsSchema>;

const STEP_TEXT: Record<ConversionStep, string> = {
  scan: "Scanning IR files...",
  process: "Normalizing documents...",
  resolve: "Resolving links...",
  write: "Writing output...",
};

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  // Ctrl+C stops taking new documents; a partial report is still written
  const controller = new AbortController();
  const onInterrupt = () => {
    spinner.text = "Cancelling...";
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.input) {
      config.input = options.input;
    }
    if (options.output) {
      config.output = options.output;
    }
    if (options.concurrency) {
      config.batch.concurrency = options.concurrency;
    }
    if (options.frontMatter === false) {
      config.markdown.frontMatter = false;
    }
    if (options.mkdocsNav) {
      config.report.mkdocsNav = true;
    }

    const tracker = new Tracker();
    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const converter = new Converter(config, {
      tracker,
      logger,
      onStep: (step) => {
        spinner.text = STEP_TEXT[step];
      },
    });

    const result = await converter.convert({ signal: controller.signal });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats({ tracker, report: result.report }, options.verbose);

    if (result.report.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
