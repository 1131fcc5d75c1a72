/**
 * =============================================================================
 * TEXT UTILITIES
 * =============================================================================
 */

/**
 * Compare two strings by Unicode code point.
 *
 * Unlike `<` on JS strings (UTF-16 code units), a character outside the BMP
 * sorts after every BMP character, e.g. '～' (U+FF5E) before '🚗' (U+1F697).
 * Same order as comparing the UTF-8 bytes; locale-independent.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(i) ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
    // Equal code points occupy the same number of code units in both strings
    i += x > 0xffff ? 2 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}
