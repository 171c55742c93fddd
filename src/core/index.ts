/**
 * Core module barrel exports.
 *
 * Re-exports the pipeline stages and the line model shared between them.
 *
 * @module core
 */

// Normalizer
export { normalize, SMART_PUNCTUATION } from './normalizer';

// Code fence vault
export {
  extractCodeFences,
  restoreCodeFences,
  restoreCodeFencesInJson,
  placeholderToken,
} from './code-fence-vault';
export type { FenceVault, FenceExtraction } from './code-fence-vault';

// Marker unifier
export { unifyMarker, BULLET_GLYPHS } from './marker-unifier';

// Indent resolver
export { expandTabs, isBlankLine, resolveIndent } from './indent-resolver';

// Source pre-clean
export { precleanSource } from './preclean';

// Renderers
export {
  RENDERERS,
  CHAT_WRAP_FENCE,
  renderMarkdown,
  renderMarkdownLines,
  renderChatSafe,
  renderDocumentBullets,
  renderPlain,
  renderOutline,
  renderOutlineJson,
  serializeOutline,
} from './renderers';

// Kinds
export { SOURCE_KINDS, TARGET_KINDS, isSourceKind, isTargetKind } from './kinds';
export type { KindInfo } from './kinds';

// Types
export type {
  SourceKind,
  TargetKind,
  IndentSize,
  BulletSymbol,
  ConversionSettings,
  IndentedLine,
  OutlineItem,
  LineRenderer,
} from './types';
