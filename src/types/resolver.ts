/**
 * Resolver module types
 */

import type { LinkLike } from "./blocks";
import type { SlugTable } from "./document";

/**
 * The document whose links are being resolved
 */
export interface LinkSource {
  sourcePath: string;
  outputPath: string;
  slugTable: SlugTable;
  slugs: string[];
}

/**
 * Link resolution result
 * Contains the rewritten link and why it was (or was not) resolved
 */
export interface LinkResolutionResult<T extends LinkLike = LinkLike> {
  link: T;
  status: "resolved" | "external" | "skipped" | "unresolved-link" | "anchor-not-found";
  warning?: string;
}
