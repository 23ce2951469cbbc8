/**
 * Scanner Module
 * Discovers IR files (*.ir.json) written by the extraction step and turns
 * them into document inputs
 */

import glob from "fast-glob";
import path from "node:path";
import { readFile } from "fs/promises";
import { z } from "zod";
import { BlockSchema, SpecialCaseSchema } from "../types";
import { describeError } from "../utils";
import type { ConversionContext, DocumentInput } from "../types";

export const IR_FILE_SUFFIX = ".ir.json";

/**
 * On-disk IR file; image bytes are base64 encoded
 */
export const IrFileSchema = z.object({
  sourcePath: z.string().min(1).optional(), // Defaults to the IR file path without its suffix
  title: z.string().optional(),
  converter: z.string().optional(),
  success: z.boolean().optional(),
  blocks: z.array(BlockSchema),
  assets: z.record(z.string(), z.string()).default({}),
  specialCase: SpecialCaseSchema.optional(),
  warnings: z.array(z.string()).optional(),
  errors: z.array(z.string()).optional(),
});

export interface ParsedDocumentFile {
  input: DocumentInput;
  error?: unknown; // Set when the file could not be read as IR
}

/**
 * Source path implied by an IR file name
 *
 * @example
 * sourcePathFromIrFile("manuals/guide.docx.ir.json") // "manuals/guide.docx"
 */
export function sourcePathFromIrFile(relativePath: string): string {
  const posixPath = relativePath.replace(/\\/g, "/");
  return posixPath.endsWith(IR_FILE_SUFFIX)
    ? posixPath.slice(0, -IR_FILE_SUFFIX.length)
    : posixPath;
}

/**
 * Input standing in for an IR file that could not be read
 */
export function failedInput(relativePath: string, error: unknown): DocumentInput {
  return {
    sourcePath: sourcePathFromIrFile(relativePath),
    success: false,
    blocks: [],
    errors: [describeError(error)],
  };
}

/**
 * Parse one IR file
 * A file that is not valid JSON or IR becomes a failed extraction, so it
 * still shows up in the batch report.
 */
export function parseDocumentFile(
  relativePath: string,
  content: string,
): ParsedDocumentFile {
  const fallbackPath = sourcePathFromIrFile(relativePath);

  try {
    const file = IrFileSchema.parse(JSON.parse(content));
    const rawAssets: Record<string, Uint8Array> = {};
    for (const [ref, encoded] of Object.entries(file.assets)) {
      rawAssets[ref] = Buffer.from(encoded, "base64");
    }

    return {
      input: {
        sourcePath: file.sourcePath ?? fallbackPath,
        title: file.title,
        converter: file.converter,
        success: file.success,
        blocks: file.blocks,
        rawAssets,
        specialCase: file.specialCase,
        warnings: file.warnings,
        errors: file.errors,
      },
    };
  } catch (error) {
    return { input: failedInput(relativePath, error), error };
  }
}

/**
 * Scans the input directory for IR files and populates context
 *
 * Writes to context:
 * - inputs: one document input per IR file, in path order
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, tracker, logger } = ctx;
  const inputDir = path.resolve(config.input);

  const files = await glob(`**/*${IR_FILE_SUFFIX}`, {
    cwd: inputDir,
    onlyFiles: true,
  });
  files.sort();

  logger.debug(`Found ${files.length} IR file(s) in ${inputDir}`);

  const inputs: DocumentInput[] = [];
  for (const file of files) {
    const filePath = path.join(inputDir, file);

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      tracker.trackResourceError(filePath, error);
      inputs.push(failedInput(file, error));
      continue;
    }

    const parsed = parseDocumentFile(file, content);
    if (parsed.error !== undefined) {
      tracker.trackResourceError(filePath, parsed.error);
    }
    inputs.push(parsed.input);
  }

  ctx.inputs = inputs;
}
