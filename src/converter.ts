import type { ConversionSettings, OutlineItem } from './core/types';
import type { ConvertMetadata, ConvertOptions, ConvertResult } from './types';
import { resolveSettings } from './config';
import { normalize } from './core/normalizer';
import { precleanSource } from './core/preclean';
import {
  extractCodeFences,
  restoreCodeFences,
  restoreCodeFencesInJson,
  type FenceVault,
} from './core/code-fence-vault';
import { isTargetKind } from './core/kinds';
import { RENDERERS, renderOutline } from './core/renderers';
import { isBlankLine, resolveIndent } from './core/indent-resolver';

/**
 * Text after normalization, pre-clean and fence extraction, split into
 * lines and ready for a renderer.
 */
interface PreparedDocument {
  settings: ConversionSettings;
  lines: string[];
  vault: FenceVault;
}

/**
 * Run the shared front half of the pipeline.
 *
 * 1. Normalize line endings, invisible whitespace and smart quotes
 * 2. Apply the source-specific pre-clean
 * 3. Swap fenced code blocks out for placeholder tokens
 * 4. Split into lines
 */
function prepare(options: ConvertOptions): PreparedDocument {
  const { text, ...overrides } = options;
  const settings = resolveSettings(overrides);

  // Untyped callers may hand us anything; absent input converts to nothing.
  const source = typeof text === 'string' ? text : '';

  let prepared = normalize(source, settings.convertSmartQuotes);
  prepared = precleanSource(prepared, settings.source);

  let vault: FenceVault = new Map();
  if (settings.keepCodeFences) {
    const extraction = extractCodeFences(prepared);
    prepared = extraction.text;
    vault = extraction.vault;
  }

  return { settings, lines: prepared.split('\n'), vault };
}

/**
 * Render prepared lines to the target and finish the output.
 *
 * Collapsing runs before restoration so protected blocks are never touched.
 */
function render({ settings, lines, vault }: PreparedDocument): string {
  const target = settings.target;
  let result = isTargetKind(target) ? RENDERERS[target](lines, settings) : lines.join('\n');

  if (settings.collapseBlankLines) {
    result = result.replace(/\n{3,}/g, '\n\n');
  }

  return target === 'outline'
    ? restoreCodeFencesInJson(result, vault)
    : restoreCodeFences(result, vault);
}

/**
 * Describe the structure of a prepared document.
 */
function collectMetadata({ settings, lines, vault }: PreparedDocument): ConvertMetadata {
  let itemCount = 0;
  let maxLevel = 0;
  for (const raw of lines) {
    if (isBlankLine(raw)) continue;
    itemCount += 1;
    maxLevel = Math.max(maxLevel, resolveIndent(raw, settings.indentSize).level);
  }

  return {
    source: settings.source,
    target: settings.target,
    lineCount: lines.length,
    itemCount,
    maxLevel,
    codeBlockCount: vault.size,
  };
}

/**
 * Reformat indented outline text for a paste destination.
 *
 * Runs the full pipeline: normalize, pre-clean for the source, protect
 * code fences, unify markers and re-indent per line, render for the
 * target, collapse blank lines, then restore the protected blocks.
 *
 * Never throws. An unknown target joins the lines verbatim and empty input
 * produces empty output (`"[]"` for the outline target).
 *
 * @param options - The text plus any settings to override.
 * @returns The converted text.
 *
 * @example
 * ```ts
 * convert({ text: '  - item\n    * sub\n' });
 * // => '  - item\n    - sub\n'
 *
 * convert({ text: '1) first\n2) second', target: 'document-bullet' });
 * // => '1. first\n2. second'
 * ```
 */
export function convert(options: ConvertOptions): string {
  return render(prepare(options));
}

/**
 * Convert and report what the converter saw in the document.
 *
 * @param options - The text plus any settings to override.
 * @returns A {@link ConvertResult} with the output and document metadata.
 */
export function convertWithMetadata(options: ConvertOptions): ConvertResult {
  const prepared = prepare(options);
  return {
    output: render(prepared),
    metadata: collectMetadata(prepared),
  };
}

/**
 * Build the structured outline as records rather than JSON text.
 *
 * Protected code blocks are restored into the `text` of the record that
 * held their placeholder. The `target` setting is ignored.
 *
 * @param options - The text plus any settings to override.
 * @returns One `{ level, text }` record per non-blank line.
 */
export function toOutline(options: ConvertOptions): OutlineItem[] {
  const prepared = prepare(options);
  return renderOutline(prepared.lines, prepared.settings).map((item) => ({
    level: item.level,
    text: restoreCodeFences(item.text, prepared.vault),
  }));
}
