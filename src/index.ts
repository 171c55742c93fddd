/**
 * outline-porter - reformat indented outline text between chat tools,
 * document editors, Markdown editors and JSON
 */

// High-level conversion API
export { convert, convertWithMetadata, toOutline } from './converter';

// Settings
export {
  DEFAULT_SETTINGS,
  INDENT_SIZES,
  BULLET_SYMBOLS,
  resolveSettings,
  parseSettings,
} from './config';
export type { ParsedSettings } from './config';

// Types
export type { ConvertOptions, ConvertResult, ConvertMetadata } from './types';

// Errors
export {
  OutlinePorterError,
  InputReadError,
  ConfigFileError,
  OutputWriteError,
} from './errors';

// Core module re-exports
export {
  normalize,
  extractCodeFences,
  restoreCodeFences,
  unifyMarker,
  expandTabs,
  resolveIndent,
  precleanSource,
  renderOutline,
  SOURCE_KINDS,
  TARGET_KINDS,
  isSourceKind,
  isTargetKind,
} from './core/index';

export type {
  SourceKind,
  TargetKind,
  IndentSize,
  BulletSymbol,
  ConversionSettings,
  IndentedLine,
  OutlineItem,
  FenceVault,
} from './core/index';
