const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;
const WINDOWS_DRIVE_PATTERN = /^[a-z]:[\\/]/i;

/**
 * Check if a link target points outside the batch
 * Scheme-qualified (http:, mailto:, ftp:, ...) and protocol-relative targets are external.
 * Windows drive paths ("C:\docs\guide.docx") are not.
 *
 * @example
 * isExternalUrl("https://example.com/guide") // true
 * isExternalUrl("mailto:support@example.com") // true
 * isExternalUrl("//cdn.example.com/logo.png") // true
 * isExternalUrl("../specs/api.docx") // false
 */
export function isExternalUrl(ref: string): boolean {
  const trimmed = ref.trim();
  if (trimmed.startsWith("//")) {
    return true;
  }
  if (WINDOWS_DRIVE_PATTERN.test(trimmed)) {
    return false;
  }
  return SCHEME_PATTERN.test(trimmed);
}
