/**
 * File kind classification.
 *
 * Every file the walker meets maps to exactly one kind, and every kind has
 * exactly one content strategy. Adding a format means adding a kind here and
 * a branch in the extractor.
 */

import * as path from 'node:path';

export const FILE_KINDS = [
  'plain-text',
  'markup-text',
  'structured-doc',
  'rich-text',
  'unsupported',
  'binary',
] as const;

export type FileKind = (typeof FILE_KINDS)[number];

/** Kinds whose content is extracted and appended as text blocks */
export type TextFileKind = Extract<FileKind, 'plain-text' | 'markup-text' | 'structured-doc' | 'rich-text'>;

const KIND_BY_EXTENSION: ReadonlyMap<string, FileKind> = new Map<string, FileKind>([
  ['.txt', 'plain-text'],
  ['.md', 'markup-text'],
  ['.docx', 'structured-doc'],
  ['.rtf', 'rich-text'],
  // Legacy Word binary format: recognised so it can be reported, never parsed
  ['.doc', 'unsupported'],
]);

/**
 * Classify a file by its extension (case-insensitive).
 */
export function classifyFile(fileName: string): FileKind {
  const ext = path.extname(fileName).toLowerCase();
  return KIND_BY_EXTENSION.get(ext) ?? 'binary';
}

export function isTextKind(kind: FileKind): kind is TextFileKind {
  switch (kind) {
    case 'plain-text':
    case 'markup-text':
    case 'structured-doc':
    case 'rich-text':
      return true;
    case 'unsupported':
    case 'binary':
      return false;
  }
}
