/**
 * Types for text extraction.
 */

import type { TextFileKind } from '../mirror/file-kind.js';

/**
 * Turns a text-like file into plain text. Formatting is discarded.
 * Implementations throw ExtractionError when the content cannot be decoded
 * and AccessError when the file cannot be read.
 */
export interface TextExtractor {
  extract(filePath: string, kind: TextFileKind): Promise<string>;
}
