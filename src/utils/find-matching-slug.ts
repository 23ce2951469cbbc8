/**
 * Match result with the strategy that produced it (lower is better)
 */
export interface SlugMatch {
  slug: string;
  step: number;
}

/**
 * Candidate slug with its derived comparison forms
 */
interface Candidate {
  slug: string;
  singular: string;
  compact: string;
  compactSingular: string;
  words: string[];
  wordsSingular: string[];
}

export const MATCH_STEPS = 12;

const singular = (s: string) => (s.length > 1 && s.endsWith("s") ? s.slice(0, -1) : s);
const compact = (s: string) => s.replace(/-/g, "");

function toCandidate(slug: string): Candidate {
  const words = slug.split("-");
  return {
    slug,
    singular: singular(slug),
    compact: compact(slug),
    compactSingular: singular(compact(slug)),
    words,
    wordsSingular: words.map(singular),
  };
}

function startsWithWords(search: string[], words: string[]): boolean {
  if (search.length > words.length) return false;
  return search.every((word, i) => word === words[i]);
}

// Ordered subsequence, at least two words long
function isWordSubsequence(words: string[], search: string[]): boolean {
  if (words.length < 2 || words.length > search.length) return false;

  let i = 0;
  for (const word of words) {
    while (i < search.length && search[i] !== word) i++;
    if (i >= search.length) return false;
    i++;
  }
  return true;
}

/**
 * Find the heading slug that best matches a link anchor
 *
 * Word-preserving:
 * 1. Exact slug
 * 2. Singular/plural of the whole slug (install-step → install-steps)
 * 3. Word prefix (configuration → configuration-options)
 * 4. Word prefix ignoring plurals (api-key → api-keys-and-tokens)
 *
 * Dash-insensitive (anchors written as "setup/teardown" or "SetUp"):
 * 5. Exact
 * 6. Exact ignoring plural
 * 7. Prefix
 * 8. Prefix ignoring plural
 *
 * Reverse (the heading is shorter than the anchor):
 * 9. Heading slug is a word prefix of the anchor (backup-schedule-weekly → backup-schedule)
 * 10. Heading words are an ordered subset of the anchor words
 * 11. Same, ignoring plurals
 *
 * Fallback:
 * 12. Every anchor word appears somewhere in the heading
 *
 * @example
 * findMatchingSlug("install-steps", ["overview", "install-steps"]) // { slug: "install-steps", step: 1 }
 * findMatchingSlug("configuration", ["configuration-options"]) // { slug: "configuration-options", step: 3 }
 */
export function findMatchingSlug(
  search: string,
  slugs: readonly string[],
  maxStep: number = MATCH_STEPS,
): SlugMatch | null {
  if (!search) return null;

  const candidates = slugs.map(toCandidate);
  const searchWords = search.split("-");
  const searchWordsSingular = searchWords.map(singular);
  const searchSingular = singular(search);
  const searchCompact = compact(search);
  const searchCompactSingular = singular(searchCompact);

  const matchers: Array<(c: Candidate) => boolean> = [
    (c) => c.slug === search,
    (c) => c.singular === searchSingular,
    (c) => startsWithWords(searchWords, c.words),
    (c) => startsWithWords(searchWordsSingular, c.wordsSingular),

    (c) => c.compact === searchCompact,
    (c) => c.compactSingular === searchCompactSingular,
    (c) => c.compact.startsWith(searchCompact),
    (c) => c.compactSingular.startsWith(searchCompactSingular),

    (c) => search.startsWith(c.slug + "-"),
    (c) => isWordSubsequence(c.words, searchWords),
    (c) => isWordSubsequence(c.wordsSingular, searchWordsSingular),

    (c) =>
      searchWords.length >= 2 &&
      searchWordsSingular.every((w) => c.wordsSingular.includes(w)),
  ];

  // Reverse strategies prefer the most specific (longest) heading
  const preferLongest = new Set([8, 9, 10]);
  const limit = Math.min(matchers.length, maxStep);

  for (let step = 0; step < limit; step++) {
    const matches = candidates.filter(matchers[step]);
    if (matches.length === 0) continue;

    // First candidate wins ties, so document order decides between equals
    const best = matches.reduce((a, b) =>
      preferLongest.has(step)
        ? b.slug.length > a.slug.length ? b : a
        : b.slug.length < a.slug.length ? b : a,
    );
    return { slug: best.slug, step: step + 1 };
  }

  return null;
}
