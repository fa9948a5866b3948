/**
 * Inline markup removal.
 *
 * Source documents sometimes carry escaped HTML inside text content
 * (`&lt;i&gt;Smith&lt;/i&gt;`). After entity decoding those arrive as literal
 * tags and must not leak into plain-text fields.
 */

/** An inline tag: `<`, optional `/`, a letter, anything but angle brackets, `>`. */
const MARKUP_PATTERN = /<\/?[A-Za-z][^<>]*>/g;

/** Remove every inline tag, leaving the surrounding text untouched. */
export function stripMarkup(text: string): string {
  return text.replace(MARKUP_PATTERN, "");
}
