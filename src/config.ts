/**
 * Default settings and validation for conversion options.
 *
 * The defaults mirror what the converter does with no configuration at
 * all. `parseSettings` is the entry point for untrusted input (CLI flags,
 * JSON config files): invalid fields are reported and replaced by the
 * defaults instead of aborting the conversion.
 */
import { z } from 'zod';

import type { BulletSymbol, ConversionSettings, IndentSize } from './core/types';

/** Allowed tab-stop widths, in ascending order. */
export const INDENT_SIZES: readonly IndentSize[] = [2, 3, 4, 8];

/** Bullet glyphs the document-bullet target can emit. */
export const BULLET_SYMBOLS: readonly BulletSymbol[] = ['•', '-'];

export const DEFAULT_SETTINGS: Readonly<ConversionSettings> = Object.freeze({
  source: 'auto',
  target: 'markdown',
  indentSize: 2,
  collapseBlankLines: true,
  trimTrailingWhitespace: true,
  keepCodeFences: true,
  chatWrapCodeblock: true,
  documentBulletSymbol: '•',
  convertSmartQuotes: true,
});

export function isIndentSize(value: unknown): value is IndentSize {
  return value === 2 || value === 3 || value === 4 || value === 8;
}

export function isBulletSymbol(value: unknown): value is BulletSymbol {
  return value === '•' || value === '-';
}

/**
 * Merge caller-supplied settings over {@link DEFAULT_SETTINGS}.
 *
 * Fields left `undefined` take the default. Values outside the allowed sets
 * (possible from untyped callers) fall back to the default as well, so the
 * conversion itself never fails.
 */
export function resolveSettings(overrides: Partial<ConversionSettings> = {}): ConversionSettings {
  const defaults = DEFAULT_SETTINGS;
  return {
    source: overrides.source ?? defaults.source,
    target: overrides.target ?? defaults.target,
    indentSize: isIndentSize(overrides.indentSize) ? overrides.indentSize : defaults.indentSize,
    collapseBlankLines: overrides.collapseBlankLines ?? defaults.collapseBlankLines,
    trimTrailingWhitespace: overrides.trimTrailingWhitespace ?? defaults.trimTrailingWhitespace,
    keepCodeFences: overrides.keepCodeFences ?? defaults.keepCodeFences,
    chatWrapCodeblock: overrides.chatWrapCodeblock ?? defaults.chatWrapCodeblock,
    documentBulletSymbol: isBulletSymbol(overrides.documentBulletSymbol)
      ? overrides.documentBulletSymbol
      : defaults.documentBulletSymbol,
    convertSmartQuotes: overrides.convertSmartQuotes ?? defaults.convertSmartQuotes,
  };
}

// ---------------------------------------------------------------------------
// Untrusted input
// ---------------------------------------------------------------------------

const settingsSchema = z
  .object({
    source: z.enum(['auto', 'chat', 'document-editor', 'markdown', 'assistant-markdown']),
    target: z.enum(['markdown', 'chat-safe', 'document-bullet', 'plain', 'outline']),
    indentSize: z.union([z.literal(2), z.literal(3), z.literal(4), z.literal(8)]),
    collapseBlankLines: z.boolean(),
    trimTrailingWhitespace: z.boolean(),
    keepCodeFences: z.boolean(),
    chatWrapCodeblock: z.boolean(),
    documentBulletSymbol: z.enum(['•', '-']),
    convertSmartQuotes: z.boolean(),
  })
  .partial()
  .strict();

/** Result of {@link parseSettings}. */
export interface ParsedSettings {
  settings: ConversionSettings;
  /** One human-readable message per rejected field. */
  warnings: string[];
}

function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `Invalid value for "${field}": ${issue.message}. Using the default.`;
}

/**
 * Validate an untrusted settings object and merge it over `base`.
 *
 * Unknown keys and invalid values are dropped with a warning; `undefined`
 * fields are skipped silently; every other field is kept.
 *
 * @param raw - Parsed JSON or collected CLI values.
 * @param base - Settings the valid fields are merged over.
 */
export function parseSettings(
  raw: unknown,
  base: Readonly<ConversionSettings> = DEFAULT_SETTINGS,
): ParsedSettings {
  if (raw === undefined || raw === null) {
    return { settings: { ...base }, warnings: [] };
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return { settings: { ...base }, warnings: ['Settings must be a JSON object. Using the defaults.'] };
  }

  const candidate: Record<string, unknown> = Object.fromEntries(
    Object.entries(raw).filter(([, value]) => value !== undefined),
  );
  const warnings: string[] = [];

  const first = settingsSchema.safeParse(candidate);
  if (first.success) {
    return { settings: { ...base, ...first.data }, warnings };
  }

  for (const issue of first.error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        warnings.push(`Unknown setting "${key}" ignored.`);
        delete candidate[key];
      }
      continue;
    }
    warnings.push(describeIssue(issue));
    const [field] = issue.path;
    if (field !== undefined) {
      delete candidate[String(field)];
    }
  }

  const second = settingsSchema.safeParse(candidate);
  return {
    settings: second.success ? { ...base, ...second.data } : { ...base },
    warnings,
  };
}
