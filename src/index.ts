/**
 * Library entry point
 */

export { Converter } from "./converter";
export type {
  ConversionResult,
  ConversionStep,
  ConverterOptions,
  RunOptions,
} from "./converter";

export {
  processDocument,
  resolveDocument,
  buildBatchReport,
  serializeReport,
} from "./modules";
export { parseDocumentFile } from "./modules/scanner";

export {
  slugify,
  normalizeHeadings,
  relocateAssets,
  computeQualityScore,
  findMatchingSlug,
  sanitizeFilename,
  renderMarkdown,
  FilenameRegistry,
  LinkRegistry,
  LinkResolver,
  RegistryError,
  Mutex,
  Tracker,
  Logger,
  loadConfig,
  loadDefaultConfig,
} from "./utils";

export * from "./types";
