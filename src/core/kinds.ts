/**
 * outline-porter - Source and Target Kinds
 *
 * Registry of the paste origins and output conventions the pipeline knows
 * about, with the human-readable labels shown by the CLI.
 */

import type { SourceKind, TargetKind } from './types';

export interface KindInfo<K extends string> {
  name: K;
  label: string;
  description: string;
}

export const SOURCE_KINDS: Readonly<Record<SourceKind, KindInfo<SourceKind>>> = {
  auto: {
    name: 'auto',
    label: 'Auto',
    description: 'No source-specific cleanup.',
  },
  chat: {
    name: 'chat',
    label: 'Chat (Slack)',
    description: 'Collapses a leading run of quote markers (">>>") to a single "> ".',
  },
  'document-editor': {
    name: 'document-editor',
    label: 'Document editor (Google Docs)',
    description: 'Turns copied "bullet + tab" list items into "- ".',
  },
  markdown: {
    name: 'markdown',
    label: 'Markdown (Obsidian)',
    description: 'Already Markdown; no cleanup.',
  },
  'assistant-markdown': {
    name: 'assistant-markdown',
    label: 'Assistant Markdown (ChatGPT)',
    description: 'Already Markdown; no cleanup.',
  },
};

export const TARGET_KINDS: Readonly<Record<TargetKind, KindInfo<TargetKind>>> = {
  markdown: {
    name: 'markdown',
    label: 'Markdown / Obsidian',
    description: 'Spaces per level and unified "- " / "1. " markers.',
  },
  'chat-safe': {
    name: 'chat-safe',
    label: 'Chat-safe (Slack)',
    description: 'Markdown output, optionally wrapped in ``` so indentation survives.',
  },
  'document-bullet': {
    name: 'document-bullet',
    label: 'Document bullets (Google Docs)',
    description: 'One tab per level and the configured bullet glyph.',
  },
  plain: {
    name: 'plain',
    label: 'Plain text',
    description: 'Tabs expanded and trailing spaces trimmed; markers untouched.',
  },
  outline: {
    name: 'outline',
    label: 'JSON outline',
    description: 'Array of { level, text } records, one per non-blank line.',
  },
};

export function isSourceKind(value: string): value is SourceKind {
  return Object.prototype.hasOwnProperty.call(SOURCE_KINDS, value);
}

export function isTargetKind(value: string): value is TargetKind {
  return Object.prototype.hasOwnProperty.call(TARGET_KINDS, value);
}
