/**
 * Core type definitions for the outline conversion pipeline.
 *
 * Shared by the normalizer, the marker/indent resolvers, and the target
 * renderers so that every stage speaks the same line model.
 */

/** Paste origins that select a source-specific pre-clean rule. */
export type SourceKind =
  | 'auto'
  | 'chat'
  | 'document-editor'
  | 'markdown'
  | 'assistant-markdown';

/** Output conventions the pipeline can render to. */
export type TargetKind =
  | 'markdown'
  | 'chat-safe'
  | 'document-bullet'
  | 'plain'
  | 'outline';

/** Allowed tab-stop widths (also the number of spaces per nesting level). */
export type IndentSize = 2 | 3 | 4 | 8;

/** Bullet glyphs accepted by the document-bullet target. */
export type BulletSymbol = '•' | '-';

/**
 * Fully resolved settings for a single conversion call.
 *
 * Every field is required here; callers usually pass a partial object
 * through `resolveSettings` to fill in defaults.
 */
export interface ConversionSettings {
  /** Paste origin. Unrecognised values skip the pre-clean step. */
  source: string;

  /** Output convention. Unrecognised values join the lines verbatim. */
  target: string;

  /**
   * Tab-stop width and spaces per nesting level.
   * @default 2
   */
  indentSize: IndentSize;

  /**
   * Collapse runs of three or more newlines down to two.
   * @default true
   */
  collapseBlankLines: boolean;

  /**
   * Strip trailing whitespace from every rendered line.
   * @default true
   */
  trimTrailingWhitespace: boolean;

  /**
   * Protect triple-backtick blocks from line processing.
   * @default true
   */
  keepCodeFences: boolean;

  /**
   * Wrap the whole chat-safe output in a fence.
   * @default true
   */
  chatWrapCodeblock: boolean;

  /**
   * Bullet glyph emitted by the document-bullet target.
   * @default '•'
   */
  documentBulletSymbol: BulletSymbol;

  /**
   * Replace typographic quotes and guillemets with ASCII.
   * @default true
   */
  convertSmartQuotes: boolean;
}

/** A content-bearing line after indent resolution. */
export interface IndentedLine {
  /** Nesting depth, derived from leading columns after tab expansion. */
  level: number;

  /** Marker-unified content with the leading whitespace removed. */
  text: string;
}

/** One record of the structured outline target. */
export interface OutlineItem {
  level: number;
  text: string;
}

/**
 * Renders the split lines of one document to a single output string.
 *
 * Renderers are stateless: everything they need is in `lines` and
 * `settings`.
 */
export type LineRenderer = (lines: readonly string[], settings: ConversionSettings) => string;
