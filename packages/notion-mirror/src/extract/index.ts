export { DefaultTextExtractor, decodeUtf8 } from './text-extractor.js';
export { rtfToText, isRtf, decodeCp1252, RtfSyntaxError } from './rtf.js';
export type { TextExtractor } from './types.js';
