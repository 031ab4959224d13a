/**
 * Minimal RTF to plain text conversion.
 *
 * Walks the control-word stream, keeps document text and drops everything
 * that only describes formatting (font and colour tables, stylesheets,
 * document info, pictures, ignorable destinations).
 *
 * `\'hh` escapes are always read as Windows-1252, whatever `\ansicpgN` the
 * document declares. Text in other code pages survives only through `\uN`
 * escapes, which current word processors write alongside the byte form.
 */

/** Destinations whose whole group is formatting metadata, not text */
const SKIPPED_DESTINATIONS = new Set([
  'fonttbl',
  'colortbl',
  'stylesheet',
  'info',
  'pict',
  'object',
  'header',
  'headerl',
  'headerr',
  'headerf',
  'footer',
  'footerl',
  'footerr',
  'footerf',
  'fldinst',
  'listtable',
  'listoverridetable',
  'rsidtbl',
  'generator',
  'themedata',
  'colorschememapping',
  'datastore',
  'latentstyles',
  'xmlnstbl',
]);

const WORD_TEXT: Readonly<Record<string, string>> = {
  par: '\n',
  line: '\n',
  sect: '\n',
  page: '\n',
  tab: '\t',
  emdash: '\u2014',
  endash: '\u2013',
  bullet: '\u2022',
  lquote: '\u2018',
  rquote: '\u2019',
  ldblquote: '\u201c',
  rdblquote: '\u201d',
};

interface GroupState {
  /** Inside a destination whose text is dropped */
  skip: boolean;
  /** Fallback characters following each \uN escape */
  unicodeSkip: number;
}

export class RtfSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RtfSyntaxError';
  }
}

/**
 * Windows-1252 characters for bytes 0x80-0x9f. Undefined slots map to the
 * C1 control of the same value; everything else matches ISO-8859-1.
 */
const CP1252_HIGH = [
  '\u20ac', '\u0081', '\u201a', '\u0192', '\u201e', '\u2026', '\u2020', '\u2021',
  '\u02c6', '\u2030', '\u0160', '\u2039', '\u0152', '\u008d', '\u017d', '\u008f',
  '\u0090', '\u2018', '\u2019', '\u201c', '\u201d', '\u2022', '\u2013', '\u2014',
  '\u02dc', '\u2122', '\u0161', '\u203a', '\u0153', '\u009d', '\u017e', '\u0178',
] as const;

/** Decode one Windows-1252 byte */
export function decodeCp1252(byte: number): string {
  if (byte >= 0x80 && byte <= 0x9f) {
    return CP1252_HIGH[byte - 0x80] ?? String.fromCharCode(byte);
  }
  return String.fromCharCode(byte);
}

/**
 * Whether the content looks like an RTF document.
 */
export function isRtf(source: string): boolean {
  return source.trimStart().startsWith('{\\rtf');
}

/**
 * Convert RTF source to plain text. Paragraph and line breaks become "\n".
 * Throws RtfSyntaxError on unbalanced groups.
 */
export function rtfToText(source: string): string {
  const stack: GroupState[] = [];
  let state: GroupState = { skip: false, unicodeSkip: 1 };
  let out = '';
  // Fallback characters still to drop after a \uN escape
  let pendingSkip = 0;

  const emit = (text: string): void => {
    if (state.skip) return;
    if (pendingSkip > 0) {
      pendingSkip--;
      return;
    }
    out += text;
  };

  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);

    if (ch === '{') {
      stack.push(state);
      state = { ...state };
      pendingSkip = 0;
      i++;
      continue;
    }

    if (ch === '}') {
      const parent = stack.pop();
      if (!parent) {
        throw new RtfSyntaxError(`Unexpected "}" at offset ${i}`);
      }
      state = parent;
      pendingSkip = 0;
      i++;
      continue;
    }

    if (ch === '\r' || ch === '\n') {
      i++;
      continue;
    }

    if (ch !== '\\') {
      emit(ch);
      i++;
      continue;
    }

    // Control symbol or control word
    const next = source.charAt(i + 1);

    if (next === '\\' || next === '{' || next === '}') {
      emit(next);
      i += 2;
      continue;
    }

    if (next === "'") {
      const hex = source.slice(i + 2, i + 4);
      const byte = parseInt(hex, 16);
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
        throw new RtfSyntaxError(`Invalid hex escape at offset ${i}`);
      }
      emit(decodeCp1252(byte));
      i += 4;
      continue;
    }

    if (next === '*') {
      state.skip = true;
      i += 2;
      continue;
    }

    if (next === '~') {
      emit('\u00a0');
      i += 2;
      continue;
    }

    if (next === '_') {
      emit('\u2011');
      i += 2;
      continue;
    }

    if (next === '\r' || next === '\n') {
      emit('\n');
      i += 2;
      continue;
    }

    const match = /^([a-zA-Z]+)(-?\d+)? ?/.exec(source.slice(i + 1, i + 64));
    if (!match) {
      // Other control symbols (\-, \|, \:) carry no text
      i += 2;
      continue;
    }

    const word = match[1] ?? '';
    const param = match[2] === undefined ? undefined : parseInt(match[2], 10);
    i += 1 + match[0].length;

    if (SKIPPED_DESTINATIONS.has(word)) {
      state.skip = true;
      continue;
    }

    if (word === 'bin' && param !== undefined) {
      // Raw binary payload follows
      i += Math.max(0, param);
      continue;
    }

    if (word === 'uc' && param !== undefined) {
      state.unicodeSkip = Math.max(0, param);
      continue;
    }

    if (word === 'u' && param !== undefined) {
      const code = param < 0 ? param + 0x10000 : param;
      emit(String.fromCharCode(code));
      if (!state.skip) {
        pendingSkip = state.unicodeSkip;
      }
      continue;
    }

    const text = WORD_TEXT[word];
    if (text !== undefined) {
      emit(text);
    }
  }

  if (stack.length > 0) {
    throw new RtfSyntaxError(`Unbalanced groups: ${stack.length} left open`);
  }

  return out;
}
