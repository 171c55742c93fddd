import type { ConversionSettings } from './core/types';

/**
 * Options for one conversion call: the text plus any settings that
 * differ from the defaults.
 */
export interface ConvertOptions extends Partial<ConversionSettings> {
  /** Pasted outline text. Never modified. */
  text: string;
}

/**
 * What the converter saw in the document.
 */
export interface ConvertMetadata {
  /** Source kind the text was pre-cleaned for */
  source: string;
  /** Target kind the text was rendered to */
  target: string;
  /** Number of lines after normalization (a protected fenced block counts as one) */
  lineCount: number;
  /** Number of content-bearing lines */
  itemCount: number;
  /** Deepest nesting level found (0 for a flat or empty document) */
  maxLevel: number;
  /** Number of fenced code blocks protected from reformatting */
  codeBlockCount: number;
}

/**
 * Result of {@link convertWithMetadata}.
 */
export interface ConvertResult {
  /** Converted text */
  output: string;
  /** Document metadata */
  metadata: ConvertMetadata;
}
