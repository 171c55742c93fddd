/**
 * outline-porter - List Marker Unifier
 *
 * Rewrites the leading bullet or numbering token of a single line into one
 * canonical Markdown form.
 *
 * @module core/marker-unifier
 */

/**
 * Bullet glyphs recognised at the start of a line: hyphen, asterisk, and
 * the Unicode bullets and dashes that chat and document tools emit.
 */
export const BULLET_GLYPHS: readonly string[] = Object.freeze([
  '-',
  '*',
  '\u2022', // • bullet
  '\u2023', // ‣ triangular bullet
  '\u2043', // ⁃ hyphen bullet
  '\u2219', // ∙ bullet operator
  '\u25E6', // ◦ white bullet
  '\u30FB', // ・ katakana middle dot
  '\u00B7', // · middle dot
  '\u204C', // ⁌ black leftwards bullet
  '\u204D', // ⁍ black rightwards bullet
  '\u2212', // − minus sign
  '\u2013', // – en dash
  '\u2014', // — em dash
  '\u2015', // ― horizontal bar
]);

function escapeForCharClass(ch: string): string {
  return /[\]\\^-]/.test(ch) ? `\\${ch}` : ch;
}

const BULLET_RE = new RegExp(`^[${BULLET_GLYPHS.map(escapeForCharClass).join('')}]\\s+`);

// Digits, a single letter, or a roman-numeral-shaped run, then `.` or `)`.
// "A. Smith" matches too; that false positive is accepted.
const NUMBERED_RE = /^(\d+|[a-zA-Z]|[ivxIVX]+)[).]\s+/;

/**
 * Canonicalize the list marker at the start of `line`.
 *
 * - Any bullet glyph plus whitespace becomes `- `
 * - `1)`, `a)`, `iv.` and friends become `<token>. ` with the token's case
 *   preserved
 *
 * Bullets are checked first. The result is a fixed point: unifying it again
 * changes nothing.
 *
 * @param line - Line content with leading indentation already removed.
 * @returns The line with its marker unified, or unchanged if it has none.
 */
export function unifyMarker(line: string): string {
  if (BULLET_RE.test(line)) {
    return line.replace(BULLET_RE, '- ');
  }
  return line.replace(NUMBERED_RE, (_match, token: string) => `${token}. `);
}
