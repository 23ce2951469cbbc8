import path from "node:path";

/**
 * Convert a source path to a readable document title
 * Drops directories, extension and numeric prefix, then capitalizes each word
 *
 * @example
 * filenameToTitle("manuals/01-user-guide.docx") // "User Guide"
 * filenameToTitle("q3_budget.xlsx") // "Q3 Budget"
 */
export function filenameToTitle(sourcePath: string): string {
  const stem = path.posix.parse(sourcePath.replace(/\\/g, "/")).name;

  return stem
    .replace(/^\d+[-_ ]/, "")
    .split(/[-_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
