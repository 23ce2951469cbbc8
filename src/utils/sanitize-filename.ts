/**
 * Sanitize a proposed document name for use in URLs and file systems
 * Whitespace becomes dashes, everything outside [a-z0-9-_] is dropped,
 * dash runs collapse and edge dashes are trimmed. Empty results become "unnamed".
 *
 * @example
 * sanitizeFilename("User Guide") // "user-guide"
 * sanitizeFilename("Release_Notes (2024)") // "release_notes-2024"
 * sanitizeFilename("***") // "unnamed"
 */
export function sanitizeFilename(name: string): string {
  const sanitized = name
    .replace(/\s+/g, "-")
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");

  return sanitized || "unnamed";
}
