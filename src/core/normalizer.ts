/**
 * outline-porter - Text Normalizer
 *
 * Canonicalizes pasted text before any line-level work so that indent
 * widths and marker matching see plain ASCII whitespace.
 *
 * @module core/normalizer
 */

/** Zero-width space, non-joiner, joiner, and the BOM / zero-width no-break space. */
const ZERO_WIDTH_RE = /[\u200B\u200C\u200D\uFEFF]/g;

/**
 * Typographic punctuation and its ASCII replacement.
 *
 * Applied only when smart-quote conversion is enabled.
 */
export const SMART_PUNCTUATION: Readonly<Record<string, string>> = Object.freeze({
  '\u201C': '"', // “
  '\u201D': '"', // ”
  '\u201E': '"', // „
  '\u2032': "'", // ′
  '\u2019': "'", // ’
  '\u2018': "'", // ‘
  '\u201B': "'", // ‛
  '\u2039': '<', // ‹
  '\u203A': '>', // ›
});

const SMART_PUNCTUATION_RE = new RegExp(`[${Object.keys(SMART_PUNCTUATION).join('')}]`, 'g');

/**
 * Normalize line endings and invisible / non-standard whitespace.
 *
 * - `\r\n` and bare `\r` become `\n`
 * - NBSP becomes one space; the ideographic (full-width) space becomes two,
 *   keeping roughly the same visual width
 * - Zero-width characters are removed
 * - Smart quotes and guillemets are mapped to ASCII when requested
 *
 * @param text - Raw pasted text.
 * @param convertSmartQuotes - Whether to apply {@link SMART_PUNCTUATION}.
 * @returns Normalized text containing only `\n` line separators.
 */
export function normalize(text: string, convertSmartQuotes: boolean): string {
  let result = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  result = result.replace(/\u00A0/g, ' ');
  result = result.replace(/\u3000/g, '  ');
  result = result.replace(ZERO_WIDTH_RE, '');

  if (convertSmartQuotes) {
    result = result.replace(SMART_PUNCTUATION_RE, (ch) => SMART_PUNCTUATION[ch] ?? ch);
  }

  return result;
}
