import path from "node:path";

export interface NavEntry {
  title: string;
  outputPath: string; // Relative to the output root
}

function directoryTitle(directory: string): string {
  return directory
    .split(/[-_/]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Build an mkdocs.yml nav section
 * Root documents come first; documents in sub-directories are grouped under one entry per directory.
 *
 * @example
 * buildNavSnippet([{ title: "User Guide", outputPath: "user-guide.md" }])
 * // 'nav:\n  - "User Guide": user-guide.md\n'
 */
export function buildNavSnippet(entries: readonly NavEntry[]): string {
  const byDirectory = new Map<string, NavEntry[]>();

  for (const entry of entries) {
    const directory = path.posix.dirname(entry.outputPath);
    const group = byDirectory.get(directory) ?? [];
    group.push(entry);
    byDirectory.set(directory, group);
  }

  const byPath = (a: NavEntry, b: NavEntry) =>
    a.outputPath < b.outputPath ? -1 : a.outputPath > b.outputPath ? 1 : 0;

  const lines = ["nav:"];
  const directories = [...byDirectory.keys()].sort((a, b) =>
    a === "." ? -1 : b === "." ? 1 : a < b ? -1 : a > b ? 1 : 0,
  );

  for (const directory of directories) {
    const group = (byDirectory.get(directory) ?? []).sort(byPath);
    const indent = directory === "." ? "  " : "    ";

    if (directory !== ".") {
      lines.push(`  - ${JSON.stringify(directoryTitle(directory))}:`);
    }
    for (const entry of group) {
      lines.push(`${indent}- ${JSON.stringify(entry.title)}: ${entry.outputPath}`);
    }
  }

  return lines.join("\n") + "\n";
}
