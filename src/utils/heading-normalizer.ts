/**
 * Heading Normalizer
 * Repairs a document's heading hierarchy and assigns per-document unique slugs
 */

import { MAX_SLUG_LENGTH, slugify } from "./slugify";
import type {
  Block,
  HeadingBlock,
  HeadingEntry,
  HeadingLevel,
  SlugTable,
} from "../types";

export interface HeadingNormalizerOptions {
  title: string; // Used when the document has no level-1 heading
  maxSlugLength?: number;
}

export interface NormalizedHeadings {
  blocks: Block[];
  headingTree: HeadingEntry[];
  slugTable: SlugTable;
  warnings: string[];
}

const FALLBACK_SLUG = "section";

/**
 * Hands out per-document unique slugs: intro, intro-2, intro-3, ...
 */
class SlugAllocator {
  private used = new Set<string>();
  private counters = new Map<string, number>();

  constructor(private maxLength: number) {}

  allocate(text: string): string {
    const base = slugify(text, this.maxLength) || FALLBACK_SLUG;

    let slug = base;
    if (this.used.has(slug)) {
      let n = (this.counters.get(base) ?? 1) + 1;
      while (this.used.has(`${base}-${n}`)) n++;
      this.counters.set(base, n);
      slug = `${base}-${n}`;
    }

    this.used.add(slug);
    return slug;
  }
}

const NEXT_LEVEL: Record<HeadingLevel, HeadingLevel> = {
  1: 2,
  2: 3,
  3: 4,
  4: 5,
  5: 6,
  6: 6,
};

/**
 * Normalize heading structure:
 * - exactly one level-1 heading (later ones are demoted to level 2)
 * - no heading deeper than previous + 1
 * - a level-1 title is synthesized when the document has none
 *
 * Never fails; every repair is reported as a warning.
 * The input blocks are not mutated.
 */
export function normalizeHeadings(
  blocks: readonly Block[],
  options: HeadingNormalizerOptions,
): NormalizedHeadings {
  const warnings: string[] = [];
  const slugs = new SlugAllocator(options.maxSlugLength ?? MAX_SLUG_LENGTH);
  const headingTree: HeadingEntry[] = [];
  const firstSlugs = new Map<string, string>(); // Plain objects drop "__proto__" keys

  const hasTitle = blocks.some((b) => b.kind === "heading" && b.level === 1);
  const source: Block[] = hasTitle
    ? [...blocks]
    : [{ kind: "heading", level: 1, text: options.title }, ...blocks];

  let titleSeen = false;
  let previousLevel: HeadingLevel = 1; // The title is the implicit root

  const normalized = source.map((block): Block => {
    if (block.kind !== "heading") {
      return block;
    }

    let level: HeadingLevel = block.level;

    if (level === 1) {
      if (titleSeen) {
        level = 2;
        warnings.push(`multiple top-level headings, demoted: '${block.text}'`);
      }
      titleSeen = true;
    }

    if (level > previousLevel + 1) {
      const corrected = NEXT_LEVEL[previousLevel];
      warnings.push(
        `heading level skip corrected: '${block.text}' (H${level} -> H${corrected})`,
      );
      level = corrected;
    }

    previousLevel = level;

    const slug = slugs.allocate(block.text);
    const heading: HeadingBlock = { ...block, level, id: slug };

    headingTree.push({ level, slug, text: heading.text });
    if (!firstSlugs.has(heading.text)) {
      firstSlugs.set(heading.text, slug);
    }

    return heading;
  });

  const slugTable: SlugTable = Object.fromEntries(firstSlugs);
  return { blocks: normalized, headingTree, slugTable, warnings };
}
