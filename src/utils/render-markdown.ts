/**
 * Markdown Renderer
 * Turns normalized blocks into MkDocs-flavoured Markdown
 */

import path from "node:path";
import { assertNever } from "../types";
import type {
  Block,
  InlineRun,
  LinkLike,
  MarkdownConfig,
  TableBlock,
  TextRun,
} from "../types";

export interface RenderOptions {
  markdown: Pick<MarkdownConfig, "headingIds" | "emphasis" | "strong">;
  outputPath: string; // Document path relative to the output root
}

/**
 * Normalize whitespace in rendered Markdown:
 * trailing spaces stripped, at most two consecutive blank lines,
 * exactly one trailing newline
 */
export function normalizeWhitespace(content: string): string {
  const lines: string[] = [];
  let blankCount = 0;

  for (const raw of content.split("\n")) {
    const line = raw.trimEnd();
    if (line === "") {
      blankCount++;
      if (blankCount > 2) continue;
    } else {
      blankCount = 0;
    }
    lines.push(line);
  }

  return lines.join("\n").trimEnd() + "\n";
}

/**
 * Link destination, wrapped in <> when it contains whitespace
 */
export function linkHref(link: LinkLike): string {
  const href =
    link.anchor && !link.targetRef.includes("#")
      ? `${link.targetRef}#${link.anchor}`
      : link.targetRef;
  return /\s/.test(href) ? `<${href}>` : href;
}

function renderText(run: TextRun, options: RenderOptions): string {
  if (run.code) {
    return `\`${run.text}\``;
  }

  let text = run.text;
  if (run.italic) {
    text = `${options.markdown.emphasis}${text}${options.markdown.emphasis}`;
  }
  if (run.bold) {
    text = `${options.markdown.strong}${text}${options.markdown.strong}`;
  }
  return text;
}

function renderRun(run: InlineRun, options: RenderOptions): string {
  switch (run.kind) {
    case "text":
      return renderText(run, options);
    case "link":
      return `[${run.displayText}](${linkHref(run)})`;
    default:
      return assertNever(run);
  }
}

function escapeCell(cell: string): string {
  return cell.replace(/\|/g, "\\|").replace(/\r?\n/g, " ").trim();
}

/**
 * GFM table; the first row is the header
 */
function renderTable(table: TableBlock): string {
  if (table.rows.length === 0) return "";

  const width = Math.max(...table.rows.map((row) => row.length), 1);
  const line = (row: string[]) => {
    const cells = Array.from({ length: width }, (_, i) => escapeCell(row[i] ?? ""));
    return `| ${cells.join(" | ")} |`;
  };

  const [header, ...body] = table.rows;
  return [
    line(header),
    `|${Array.from({ length: width }, () => " --- ").join("|")}|`,
    ...body.map(line),
  ].join("\n");
}

function renderBlock(block: Block, options: RenderOptions): string {
  switch (block.kind) {
    case "heading": {
      const id = options.markdown.headingIds && block.id ? ` {#${block.id}}` : "";
      return `${"#".repeat(block.level)} ${block.text}${id}`;
    }
    case "paragraph":
      return block.runs.map((run) => renderRun(run, options)).join("");
    case "image": {
      // Assigned paths are relative to the output root
      const src = block.assignedPath
        ? path.posix.relative(path.posix.dirname(options.outputPath), block.assignedPath)
        : block.sourceRef;
      return `![${block.altText}](${src})`;
    }
    case "link":
      return `[${block.displayText}](${linkHref(block)})`;
    case "table":
      return renderTable(block);
    default:
      return assertNever(block);
  }
}

/**
 * Render blocks to Markdown, one block per paragraph
 *
 * @example
 * renderMarkdown([{ kind: "heading", level: 1, text: "Guide", id: "guide" }], options)
 * // "# Guide {#guide}\n"
 */
export function renderMarkdown(
  blocks: readonly Block[],
  options: RenderOptions,
): string {
  const parts = blocks
    .map((block) => renderBlock(block, options))
    .filter((part) => part.length > 0);

  return normalizeWhitespace(parts.join("\n\n"));
}
