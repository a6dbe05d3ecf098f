/**
 * Text Sanitization
 */

/** Control, format, private-use, unassigned and separator characters */
const NON_PRINTABLE = /[\p{C}\p{Z}]/gu

/** Kept even though they fall in the categories above */
const KEPT = new Set([' ', '\n', '\t', '\r'])

/**
 * Strip non-printable characters (newline, tab and carriage return survive),
 * then trim. Non-ASCII spaces such as U+00A0 count as non-printable and are
 * removed, not converted.
 */
export function sanitizeText(text: string): string {
  if (!text) return ''
  return text.replace(NON_PRINTABLE, (char) => (KEPT.has(char) ? char : '')).trim()
}
