/**
 * Target renderers for the outline pipeline.
 *
 * Each renderer takes the split lines of one document and produces the
 * final text for a destination. Key conventions:
 *
 * - Blank lines stay blank (and are dropped from the JSON outline)
 * - Markdown-like targets re-indent with `level * indentSize` spaces
 * - Document editors detect nesting from tabs, so that target uses one tab
 *   per level
 * - Plain text keeps markers and indentation exactly as pasted
 */

import { expandTabs, isBlankLine, resolveIndent } from './indent-resolver';
import type { ConversionSettings, LineRenderer, OutlineItem, TargetKind } from './types';

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

function finishLine(line: string, settings: ConversionSettings): string {
  return settings.trimTrailingWhitespace ? line.trimEnd() : line;
}

/**
 * Fence delimiter used to wrap chat-safe output. Chat clients render the
 * wrapped body as preformatted text and leave its indentation alone.
 */
export const CHAT_WRAP_FENCE = '```';

// ---------------------------------------------------------------------------
// Line renderers
// ---------------------------------------------------------------------------

/**
 * Re-indent every content line with `level * indentSize` spaces and unify
 * its marker.
 */
export function renderMarkdownLines(
  lines: readonly string[],
  settings: ConversionSettings,
): string[] {
  return lines.map((raw) => {
    if (isBlankLine(raw)) return '';
    const { level, text } = resolveIndent(raw, settings.indentSize);
    return finishLine(' '.repeat(level * settings.indentSize) + text, settings);
  });
}

export const renderMarkdown: LineRenderer = (lines, settings) =>
  renderMarkdownLines(lines, settings).join('\n');

/**
 * Markdown rendering, optionally wrapped in a bare fence. A body without
 * content is never wrapped.
 */
export const renderChatSafe: LineRenderer = (lines, settings) => {
  const body = renderMarkdown(lines, settings);
  if (!settings.chatWrapCodeblock || body.trim().length === 0) return body;
  return `${CHAT_WRAP_FENCE}\n${body}\n${CHAT_WRAP_FENCE}`;
};

/**
 * One tab per level; unified `- ` bullets become the configured symbol.
 * Numbered markers keep their `1. ` form.
 */
export const renderDocumentBullets: LineRenderer = (lines, settings) =>
  lines
    .map((raw) => {
      if (isBlankLine(raw)) return '';
      const { level, text } = resolveIndent(raw, settings.indentSize);
      const bulleted = text.replace(/^-\s+/, `${settings.documentBulletSymbol} `);
      return finishLine('\t'.repeat(level) + bulleted, settings);
    })
    .join('\n');

/**
 * Tab expansion and trailing trim only.
 */
export const renderPlain: LineRenderer = (lines, settings) =>
  lines.map((raw) => finishLine(expandTabs(raw, settings.indentSize), settings)).join('\n');

// ---------------------------------------------------------------------------
// Structured outline
// ---------------------------------------------------------------------------

/**
 * Build `{ level, text }` records for every content-bearing line.
 *
 * @returns Records in document order; blank lines are skipped.
 */
export function renderOutline(
  lines: readonly string[],
  settings: ConversionSettings,
): OutlineItem[] {
  const items: OutlineItem[] = [];
  for (const raw of lines) {
    if (isBlankLine(raw)) continue;
    const { level, text } = resolveIndent(raw, settings.indentSize);
    items.push({ level, text: finishLine(text, settings) });
  }
  return items;
}

/**
 * Serialize outline records as pretty-printed JSON (two-space indent).
 */
export function serializeOutline(items: readonly OutlineItem[]): string {
  return JSON.stringify(items, null, 2);
}

export const renderOutlineJson: LineRenderer = (lines, settings) =>
  serializeOutline(renderOutline(lines, settings));

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const RENDERERS: Readonly<Record<TargetKind, LineRenderer>> = {
  markdown: renderMarkdown,
  'chat-safe': renderChatSafe,
  'document-bullet': renderDocumentBullets,
  plain: renderPlain,
  outline: renderOutlineJson,
};
