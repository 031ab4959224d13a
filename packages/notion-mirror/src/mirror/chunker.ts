/**
 * Splits text into ordered pieces that each fit in one Notion text block.
 */

/** Notion rejects rich text content longer than this */
export const NOTION_TEXT_BLOCK_LIMIT = 2000;

export type ChunkSplitMode = 'length' | 'whitespace';

export interface ChunkOptions {
  /** Maximum chunk length in UTF-16 code units (default: 2000) */
  maxLength?: number;
  /**
   * 'length' cuts at exactly maxLength.
   * 'whitespace' backs off to the last newline or whitespace in the second
   * half of the window, when there is one.
   */
  splitAt?: ChunkSplitMode;
}

/**
 * Chunk `text` so that `chunks.join('') === text` and no chunk is longer
 * than `maxLength`. Empty input yields no chunks.
 */
export function chunkText(text: string, options?: ChunkOptions): string[] {
  const maxLength = options?.maxLength ?? NOTION_TEXT_BLOCK_LIMIT;
  const splitAt = options?.splitAt ?? 'length';

  if (!Number.isInteger(maxLength) || maxLength < 2) {
    throw new RangeError(`maxLength must be an integer of at least 2, got ${maxLength}`);
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length);

    if (end < text.length) {
      if (splitAt === 'whitespace') {
        end = findBoundary(text, start, end);
      }
      // Never leave half a surrogate pair at the end of a chunk
      if (isHighSurrogate(text.charCodeAt(end - 1))) {
        end -= 1;
      }
    }

    chunks.push(text.slice(start, end));
    start = end;
  }

  return chunks;
}

/**
 * Cut `text` to at most `maxLength` code units without splitting a
 * surrogate pair.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  const end = isHighSurrogate(text.charCodeAt(maxLength - 1)) ? maxLength - 1 : maxLength;
  return text.slice(0, end);
}

/**
 * Find a cut position in (start + half window, end]. Prefers the position
 * right after a newline, then right after any whitespace. Returns `end` when
 * neither is found.
 */
function findBoundary(text: string, start: number, end: number): number {
  const floor = start + Math.floor((end - start) / 2);

  const newline = text.lastIndexOf('\n', end - 1);
  if (newline >= floor) {
    return newline + 1;
  }

  for (let i = end - 1; i >= floor; i--) {
    if (/\s/.test(text.charAt(i))) {
      return i + 1;
    }
  }

  return end;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
