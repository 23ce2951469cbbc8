/**
 * Utility exports
 */

// Slug and anchor utilities
export { slugify, MAX_SLUG_LENGTH } from "./slugify";
export { findMatchingSlug, MATCH_STEPS } from "./find-matching-slug";
export type { SlugMatch } from "./find-matching-slug";

// URL utilities
export { isExternalUrl } from "./is-external-url";

// Path/filename utilities
export { filenameToTitle } from "./filename-to-title";
export { sanitizeFilename } from "./sanitize-filename";

// Document utilities
export { normalizeHeadings } from "./heading-normalizer";
export type {
  HeadingNormalizerOptions,
  NormalizedHeadings,
} from "./heading-normalizer";
export { relocateAssets, imageExtension } from "./asset-relocator";
export type { AssetRelocatorOptions, RelocatedAssets } from "./asset-relocator";
export {
  compareSourcePaths,
  createRecord,
  createRejectedRecord,
  failDocument,
  toDocumentOutput,
} from "./document-record";
export { computeQualityScore, DEFAULT_QUALITY_WEIGHTS } from "./quality-score";
export { renderMarkdown, normalizeWhitespace, linkHref } from "./render-markdown";
export type { RenderOptions } from "./render-markdown";
export { buildNavSnippet } from "./build-nav-snippet";
export type { NavEntry } from "./build-nav-snippet";

// Error utilities
export { describeError } from "./describe-error";
export { RegistryError } from "./registry-error";

// Concurrency utilities
export { Mutex } from "./mutex";
export { runPool } from "./run-pool";
export type { PoolResult } from "./run-pool";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";
export type { ConfigError, LoadConfigResult } from "./load-config";

// Template utilities
export { loadTemplate } from "./load-template";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
export { FilenameRegistry } from "./filename-registry";
export { LinkRegistry, normalizeSourcePath } from "./link-registry";
export type { LinkRegistryEntry } from "./link-registry";
export { LinkResolver } from "./link-resolver";
