/**
 * Types for the mirror walker.
 */

import type { ChunkSplitMode } from './chunker.js';
import type { FileKind } from './file-kind.js';
import type { RemoteOperation } from './errors.js';

/** What to do when a child subtree fails */
export type RemoteErrorPolicy = 'abort' | 'skip';

export interface MirrorConfig {
  /** 'abort' stops the whole run on the first failure; 'skip' isolates it to the subtree */
  onRemoteError: RemoteErrorPolicy;
  /** Mirror entries whose name starts with a dot (default: false) */
  includeHidden: boolean;
  /** Chunk boundary strategy for text blocks */
  splitAt: ChunkSplitMode;
  /** Text files above this size are attached as file references instead */
  maxTextFileBytes: number;
  /** Base URL for placeholder file-reference links */
  placeholderBaseUrl: string;
}

export const DEFAULT_MIRROR_CONFIG: MirrorConfig = {
  onRemoteError: 'abort',
  includeHidden: false,
  splitAt: 'length',
  maxTextFileBytes: 5 * 1024 * 1024, // 5 MB
  placeholderBaseUrl: 'https://example.com/files/',
};

/** A directory entry, after stat and classification */
export type LocalEntry =
  | {
      type: 'directory';
      name: string;
      path: string;
      /** Canonical path with links resolved; identifies the directory in cycle checks */
      realPath: string;
    }
  | { type: 'file'; name: string; path: string; sizeBytes: number; kind: FileKind };

/** A subtree that failed under the 'skip' policy */
export interface MirrorFailure {
  /** Local path of the entry whose subtree was skipped */
  path: string;
  /** Error class name */
  error: string;
  message: string;
  /** Failing remote operation, for RemoteServiceError */
  operation?: RemoteOperation;
  retryable: boolean;
}

export interface MirrorStats {
  documentsCreated: number;
  textBlocksAppended: number;
  fileBlocksAppended: number;
  /** Text-like files that were attached as a file reference instead */
  fallbacks: number;
  /** Hidden or special entries left out of the mirror */
  skippedEntries: number;
  failures: MirrorFailure[];
}

export function createEmptyStats(): MirrorStats {
  return {
    documentsCreated: 0,
    textBlocksAppended: 0,
    fileBlocksAppended: 0,
    fallbacks: 0,
    skippedEntries: 0,
    failures: [],
  };
}

export interface MirrorOptions {
  /** Checked before every remote call */
  signal?: AbortSignal;
}
