/**
 * outline-porter - Source Pre-clean
 *
 * Small fixed rules that undo paste artifacts specific to one source. They
 * are heuristics, not a normalization guarantee: anything they do not
 * recognise passes through unchanged.
 *
 * @module core/preclean
 */

import { isSourceKind } from './kinds';
import type { SourceKind } from './types';

/**
 * Chat clients send nested quotes as `>>>`; collapse the leading run of `>`
 * (plus one space or tab) to a single `> `. Spaced markers such as `> >`
 * are left as they are.
 */
function collapseQuoteMarkers(text: string): string {
  return text.replace(/^>+[ \t]?/gm, '> ');
}

/**
 * Document editors copy list bullets as a bullet glyph followed by a tab.
 */
function replaceBulletTabs(text: string): string {
  return text.replace(/\u2022\t/g, '- ');
}

function passThrough(text: string): string {
  return text;
}

const PRECLEAN_RULES: Readonly<Record<SourceKind, (text: string) => string>> = {
  auto: passThrough,
  chat: collapseQuoteMarkers,
  'document-editor': replaceBulletTabs,
  markdown: passThrough,
  'assistant-markdown': passThrough,
};

/**
 * Apply the pre-clean rule registered for `source`.
 *
 * @param text - Normalized text.
 * @param source - Paste origin; unknown values leave the text untouched.
 */
export function precleanSource(text: string, source: string): string {
  if (!isSourceKind(source)) return text;
  return PRECLEAN_RULES[source](text);
}
