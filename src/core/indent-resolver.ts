/**
 * outline-porter - Indent Resolver
 *
 * Turns a raw line into a nesting level and marker-unified content.
 *
 * @module core/indent-resolver
 */

import { unifyMarker } from './marker-unifier';
import type { IndentedLine } from './types';

const LEADING_WS_RE = /^([ \t]*)([\s\S]*)$/;

/**
 * Expand tab characters to spaces using column-aware tab stops.
 *
 * A tab advances to the next multiple of `tabSize`, so `"ab\tc"` with a
 * tab size of 4 becomes `"ab  c"`.
 *
 * @param line - A single line (no `\n`).
 * @param tabSize - Tab-stop width in columns. Values below 1 remove tabs.
 * @returns The line with every tab replaced by spaces.
 */
export function expandTabs(line: string, tabSize: number): string {
  if (!line.includes('\t')) return line;

  let column = 0;
  let result = '';
  for (const ch of line) {
    if (ch === '\t') {
      if (tabSize > 0) {
        const pad = tabSize - (column % tabSize);
        result += ' '.repeat(pad);
        column += pad;
      }
      continue;
    }
    result += ch;
    column += 1;
  }
  return result;
}

/**
 * Whether a line carries no content (empty or whitespace only).
 */
export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Split a tab-expanded line into its leading spaces and the rest.
 */
function splitLeading(expanded: string): [string, string] {
  const match = LEADING_WS_RE.exec(expanded);
  return match ? [match[1], match[2]] : ['', expanded];
}

/**
 * Compute the nesting level of a content-bearing line and unify its marker.
 *
 * Levels are measured after tab expansion, so a tab and `indentSize`
 * spaces describe the same depth.
 *
 * @param rawLine - A content-bearing line; blank lines are handled upstream.
 * @param indentSize - Columns per level, also used as the tab-stop width.
 */
export function resolveIndent(rawLine: string, indentSize: number): IndentedLine {
  const [leading, rest] = splitLeading(expandTabs(rawLine, indentSize));
  return {
    level: Math.floor(leading.length / indentSize),
    text: unifyMarker(rest),
  };
}
