/**
 * Writer Module
 * Packages the batch on disk: Markdown pages, relocated images, the JSON
 * report, stats.json and (optionally) an mkdocs nav snippet
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import { getDefaultFileTemplate } from "../templates/defaults";
import {
  buildNavSnippet,
  describeError,
  failDocument,
  type NavEntry,
  loadTemplate,
  normalizeWhitespace,
  renderMarkdown,
} from "../utils";
import { report as buildReport, serializeReport } from "./report";
import type { ConversionContext } from "../types";

export const NAV_SNIPPET_FILENAME = "mkdocs-nav-snippet.yml";
export const STATS_FILENAME = "stats.json";

/**
 * Template context for a document page
 */
export interface FileTemplateContext {
  title: string;
  source: string;
  convertedAt: string;
  qualityScore: number;
  content: string;
}

async function writeOutputFile(
  filePath: string,
  data: string | Uint8Array,
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, data);
}

/**
 * Writes every resolved document and the batch artifacts to the output directory
 */
export async function write(ctx: ConversionContext): Promise<void> {
  if (!ctx.documents || !ctx.report) {
    throw new Error("Converter must run before writer");
  }

  const { config, tracker, logger } = ctx;
  const outputDir = path.resolve(config.output);
  const convertedAt = new Date().toISOString();

  let template: HandlebarsTemplateDelegate;
  try {
    template = await loadTemplate(
      config.markdown.fileTemplate,
      getDefaultFileTemplate(config.markdown),
    );
  } catch (error) {
    // A broken custom template falls back to the built-in one
    tracker.trackResourceError(config.markdown.fileTemplate ?? "template", error);
    template = await loadTemplate(null, getDefaultFileTemplate(config.markdown));
  }

  const written: NavEntry[] = [];
  let writeFailed = false;

  for (const doc of ctx.documents) {
    const { outputPath } = doc;
    if (doc.status !== "resolved" || !outputPath) continue;

    const filePath = path.join(outputDir, outputPath);
    try {
      const context: FileTemplateContext = {
        title: doc.title,
        source: doc.sourcePath,
        convertedAt,
        qualityScore: doc.qualityScore,
        content: renderMarkdown(doc.blocks, {
          markdown: config.markdown,
          outputPath,
        }).trimEnd(),
      };
      // Images first, so a page never points at images that were not written
      for (const asset of doc.assets) {
        await writeOutputFile(path.join(outputDir, asset.path), asset.bytes);
      }
      await writeOutputFile(filePath, normalizeWhitespace(template(context)));

      written.push({ title: doc.title, outputPath });
      logger.debug(`Wrote ${filePath}`);
    } catch (error) {
      failDocument(
        doc,
        "processing-error",
        `failed to write ${outputPath}: ${describeError(error)}`,
      );
      tracker.trackResourceError(filePath, error, "write");
      tracker.markResolvedAsFailed();
      logger.error(`Failed to write ${filePath}`);
      writeFailed = true;
    }
  }

  // The report was built before writing; refresh it so failed pages show up
  if (writeFailed) {
    buildReport(ctx);
  }
  const { report } = ctx;
  if (!report) {
    throw new Error("Report module failed to populate the batch report");
  }

  const reportPath = path.join(outputDir, config.report.filename);
  try {
    const json = JSON.stringify(serializeReport(report), null, 2);
    await writeOutputFile(reportPath, json + "\n");
  } catch (error) {
    tracker.trackResourceError(reportPath, error, "write");
  }

  if (config.report.mkdocsNav) {
    const navPath = path.join(outputDir, NAV_SNIPPET_FILENAME);
    try {
      await writeOutputFile(navPath, buildNavSnippet(written));
      logger.info(`MkDocs nav snippet saved to ${navPath}`);
    } catch (error) {
      tracker.trackResourceError(navPath, error, "write");
    }
  }

  // Written last so it includes any write issues above
  const statsPath = path.join(outputDir, STATS_FILENAME);
  try {
    const json = JSON.stringify(tracker.exportStats(), null, 2);
    await writeOutputFile(statsPath, json + "\n");
  } catch (error) {
    tracker.trackResourceError(statsPath, error, "write");
  }
}
