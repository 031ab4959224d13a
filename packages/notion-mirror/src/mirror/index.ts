export { MirrorWalker } from './mirror-walker.js';
export type { MirrorWalkerOptions } from './mirror-walker.js';
export { buildMirrorConfig, validateMirrorConfig } from './config.js';
export { chunkText, truncateText, NOTION_TEXT_BLOCK_LIMIT } from './chunker.js';
export type { ChunkOptions, ChunkSplitMode } from './chunker.js';
export { classifyFile, isTextKind, FILE_KINDS } from './file-kind.js';
export type { FileKind, TextFileKind } from './file-kind.js';
export { assertReadable, compareNames, listDirectory, statEntry } from './local-tree.js';
export type { DirectoryListing } from './local-tree.js';
export {
  MirrorError,
  ConfigurationError,
  AccessError,
  ExtractionError,
  RemoteServiceError,
  MirrorAbortedError,
  describeError,
} from './errors.js';
export type { MirrorErrorCode, RemoteOperation, RemoteServiceErrorDetails } from './errors.js';
export { DEFAULT_MIRROR_CONFIG, createEmptyStats } from './types.js';
export type {
  MirrorConfig,
  MirrorOptions,
  MirrorStats,
  MirrorFailure,
  LocalEntry,
  RemoteErrorPolicy,
} from './types.js';
export {
  NotionDocumentService,
  DryRunDocumentService,
  normalizePageId,
  placeholderFileUrl,
} from '../notion/index.js';
export type { DocumentService } from '../notion/index.js';
export { DefaultTextExtractor } from '../extract/index.js';
export type { TextExtractor } from '../extract/index.js';
