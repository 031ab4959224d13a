/**
 * Default text extractor: one strategy per text file kind.
 *
 * A file that cannot be read at all fails with AccessError; content that
 * cannot be turned into text fails with ExtractionError.
 */

import * as fs from 'node:fs/promises';
import mammoth from 'mammoth';
import { AccessError, ExtractionError, describeError } from '../mirror/errors.js';
import type { TextFileKind } from '../mirror/file-kind.js';
import { isRtf, rtfToText } from './rtf.js';
import type { TextExtractor } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false });

export class DefaultTextExtractor implements TextExtractor {
  async extract(filePath: string, kind: TextFileKind): Promise<string> {
    switch (kind) {
      case 'plain-text':
      case 'markup-text':
        return decodeUtf8(filePath, await readBytes(filePath));

      case 'rich-text':
        return extractRtf(filePath, await readBytes(filePath));

      case 'structured-doc':
        return extractDocx(filePath, await readBytes(filePath));
    }
  }
}

async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new AccessError(filePath, describeError(err), { cause: err });
  }
}

/**
 * Strict UTF-8 decode. A leading byte order mark is dropped.
 */
export function decodeUtf8(filePath: string, bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new ExtractionError(filePath, 'content is not valid UTF-8', { cause: err });
  }
}

function extractRtf(filePath: string, bytes: Uint8Array): string {
  // RTF is 7-bit by definition; 8-bit characters arrive as \'hh escapes
  const source = Buffer.from(bytes).toString('latin1');
  if (!isRtf(source)) {
    throw new ExtractionError(filePath, 'missing {\\rtf header');
  }
  try {
    return rtfToText(source);
  } catch (err) {
    throw new ExtractionError(filePath, describeError(err), { cause: err });
  }
}

async function extractDocx(filePath: string, buffer: Buffer): Promise<string> {
  try {
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
  } catch (err) {
    throw new ExtractionError(filePath, describeError(err), { cause: err });
  }
}
