/**
 * Link Registry
 * Batch-scoped map of source path → output path + slug table.
 * Written once per document during Phase 1, sealed and read-only during Phase 2.
 */

import path from "node:path";
import { Mutex } from "./mutex";
import { RegistryError } from "./registry-error";
import type { SlugTable } from "../types";

export interface LinkRegistryEntry {
  sourcePath: string;
  outputPath: string;
  slugTable: SlugTable; // heading text → slug (first occurrence)
  slugs: string[]; // every heading slug, in document order
}

/**
 * Normalize a document path for use as a registry key
 *
 * @example
 * normalizeSourcePath(".\\manuals\\Guide.docx") // "manuals/Guide.docx"
 * normalizeSourcePath("manuals/../specs/api.pdf") // "specs/api.pdf"
 */
export function normalizeSourcePath(sourcePath: string): string {
  const normalized = path.posix.normalize(sourcePath.replace(/\\/g, "/"));
  return normalized.replace(/^(\.\/)+/, "");
}

function decodePath(ref: string): string {
  try {
    return decodeURI(ref);
  } catch {
    return ref; // Malformed escapes: match the reference as written
  }
}

export class LinkRegistry {
  private mutex = new Mutex();
  private entriesByPath = new Map<string, LinkRegistryEntry>();
  private entriesByName = new Map<string, LinkRegistryEntry[]>();
  private isSealed = false;

  /**
   * Publish a document's entry (exactly once per document)
   */
  async publish(entry: LinkRegistryEntry): Promise<void> {
    const key = normalizeSourcePath(entry.sourcePath);

    await this.mutex.runExclusive(() => {
      if (this.isSealed) {
        throw new RegistryError(
          `Cannot publish "${key}": link registry is sealed`,
        );
      }
      if (this.entriesByPath.has(key)) {
        throw new RegistryError(`"${key}" is already registered`);
      }

      this.entriesByPath.set(key, entry);

      const name = path.posix.basename(key);
      const sameName = this.entriesByName.get(name) ?? [];
      sameName.push(entry);
      this.entriesByName.set(name, sameName);
    });
  }

  /**
   * Exact lookup by source path
   */
  lookup(sourcePath: string): LinkRegistryEntry | undefined {
    return this.entriesByPath.get(normalizeSourcePath(sourcePath));
  }

  /**
   * Find the document a link target refers to
   * Tries, in order: the path as written, the path relative to the linking
   * document's directory, and finally a file name shared by no other document.
   *
   * @example
   * // registry holds "manuals/install.docx"
   * registry.findTarget("install.docx", "manuals/guide.docx") // relative match
   * registry.findTarget("C:\\Shared\\install.docx", "notes.docx") // unique file name match
   */
  findTarget(
    targetPath: string,
    fromSourcePath: string,
  ): LinkRegistryEntry | undefined {
    const decoded = decodePath(targetPath).replace(/\\/g, "/");
    if (!decoded) return undefined;

    const exact = this.lookup(decoded);
    if (exact) return exact;

    const fromDir = path.posix.dirname(normalizeSourcePath(fromSourcePath));
    const relative = this.lookup(path.posix.join(fromDir, decoded));
    if (relative) return relative;

    const sameName = this.entriesByName.get(path.posix.basename(decoded));
    if (sameName?.length === 1) {
      return sameName[0];
    }

    return undefined;
  }

  entries(): LinkRegistryEntry[] {
    return [...this.entriesByPath.values()];
  }

  get size(): number {
    return this.entriesByPath.size;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  /**
   * Make the registry read-only (called at the phase barrier)
   */
  seal(): void {
    this.isSealed = true;
  }
}
