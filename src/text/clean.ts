/**
 * Whitespace normalization for text pulled out of XML.
 */

/**
 * Replace newlines with spaces, collapse whitespace runs to a single space
 * and trim. `clean(clean(x)) === clean(x)`.
 */
export function clean(text: string): string {
  return text.replace(/\n/g, " ").replace(/\s+/g, " ").trim();
}
