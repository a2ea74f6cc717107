/**
 * Canonicalize a free-text identifier into its comparison-stable form.
 *
 * "Les Aigles Rouges", " les  aigles rouges " and "Lés Aigles Rouges"
 * canonicalize to the same key, so re-entered names derive the same token.
 *
 * Idempotent: canonicalize(canonicalize(t)) === canonicalize(t).
 * Used only as hash input. Never displayed.
 */

// Whitespace: bidi class WS, B or S, or category Zs. Unlike the JS \s class
// this includes U+001C-U+001F and U+0085 and excludes U+FEFF.
const SPACE = '\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000';

const COMBINING_MARKS = /\p{Mn}/gu;
const EDGE_SPACE = new RegExp(`^[${SPACE}]+|[${SPACE}]+$`, 'g');
const NOT_KEY_CHAR = new RegExp(`[^a-z0-9${SPACE}]`, 'g');
const WHITESPACE_RUN = new RegExp(`[${SPACE}]+`, 'g');

export function canonicalize(text: string): string {
  if (!text) return '';

  return text
    .replace(EDGE_SPACE, '')
    .toLowerCase()
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(NOT_KEY_CHAR, '')
    .replace(WHITESPACE_RUN, ' ')
    .replace(EDGE_SPACE, '');
}
