/**
 * Asset Relocator
 * Assigns each embedded image a deterministic path under the document's asset
 * directory and collects the bytes for the packaging step. Performs no I/O.
 */

import path from "node:path";
import { isExternalUrl } from "./is-external-url";
import type { AssetFile, Block, ImageBlock } from "../types";

export interface AssetRelocatorOptions {
  documentSlug: string; // Unique output name of the document
  directory?: string; // Asset root relative to the output root
  sequenceWidth?: number;
  defaultExtension?: string;
}

export interface RelocatedAssets {
  blocks: Block[];
  assets: AssetFile[];
  missing: string[]; // References whose bytes were not extracted
  warnings: string[];
}

const IMAGE_EXTENSION_PATTERN = /^[a-z0-9]{1,5}$/;

/**
 * Get the lower-cased extension of an image reference, without the dot
 *
 * @example
 * imageExtension("media/image1.PNG", "png") // "png"
 * imageExtension("rId7", "png") // "png"
 */
export function imageExtension(sourceRef: string, fallback: string): string {
  const clean = sourceRef.split(/[?#]/)[0];
  const ext = path.posix.extname(clean.replace(/\\/g, "/")).slice(1).toLowerCase();
  return IMAGE_EXTENSION_PATTERN.test(ext) ? ext : fallback;
}

/**
 * Relocate images in appearance order
 *
 * @example
 * // two images in "user-guide"
 * // → assets/user-guide/001.png, assets/user-guide/002.jpg
 */
export function relocateAssets(
  blocks: readonly Block[],
  rawAssets: Readonly<Record<string, Uint8Array>>,
  options: AssetRelocatorOptions,
): RelocatedAssets {
  const directory = options.directory ?? "assets";
  const width = options.sequenceWidth ?? 3;
  const fallbackExtension = options.defaultExtension ?? "png";

  const assets: AssetFile[] = [];
  const missing: string[] = [];
  const warnings: string[] = [];
  let sequence = 0;

  const relocate = (image: ImageBlock): ImageBlock => {
    if (isExternalUrl(image.sourceRef)) {
      return image;
    }

    const bytes = Object.hasOwn(rawAssets, image.sourceRef)
      ? rawAssets[image.sourceRef]
      : undefined;
    if (!bytes) {
      missing.push(image.sourceRef);
      warnings.push(`image data missing: ${image.sourceRef}`);
      return image;
    }

    sequence++;
    const name = String(sequence).padStart(width, "0");
    const ext = imageExtension(image.sourceRef, fallbackExtension);
    const assignedPath = path.posix.join(
      directory,
      options.documentSlug,
      `${name}.${ext}`,
    );

    assets.push({ path: assignedPath, bytes });
    return { ...image, assignedPath };
  };

  const relocated = blocks.map((block) =>
    block.kind === "image" ? relocate(block) : block,
  );

  return { blocks: relocated, assets, missing, warnings };
}
