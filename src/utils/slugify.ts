/**
 * Default maximum slug length, in code points
 */
export const MAX_SLUG_LENGTH = 80;

/**
 * Generate a URL-safe anchor slug from heading text
 * Unicode letters, combining marks and numbers are kept; every other run becomes one dash.
 * Long slugs are cut back to the last dash inside the limit so words stay whole.
 *
 * @example
 * slugify("Install Steps") // "install-steps"
 * slugify("Q&A: Setup (v2)") // "q-a-setup-v2"
 * slugify("Übersicht") // "übersicht"
 */
export function slugify(text: string, maxLength: number = MAX_SLUG_LENGTH): string {
  const slug = text
    .toLowerCase()
    .normalize("NFC")
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");

  return truncateSlug(slug, maxLength);
}

function truncateSlug(slug: string, maxLength: number): string {
  const codePoints = Array.from(slug);
  if (codePoints.length <= maxLength) {
    return slug;
  }

  const kept = codePoints.slice(0, maxLength).join("");

  // Cut at a word boundary when the next character does not already start one
  if (codePoints[maxLength] !== "-") {
    const lastDash = kept.lastIndexOf("-");
    if (lastDash > 0) {
      return kept.slice(0, lastDash);
    }
  }

  return kept.replace(/-+$/, "");
}
