/**
 * Mirror walker: reproduces a local folder tree as Notion pages.
 *
 * Depth-first and strictly sequential. A directory's page is created before
 * any of its children's pages, and a file's text blocks are appended in chunk
 * order. Children are visited in one combined alphabetical pass, so files and
 * subdirectories interleave. A directory link back to one of its own
 * ancestors is skipped, so every page maps to one local node.
 *
 * @example
 * ```ts
 * const walker = new MirrorWalker({
 *   service: new NotionDocumentService({ token, logger }),
 *   logger,
 * });
 * const rootPageId = await walker.mirror('./notes', parentPageId);
 * ```
 */

import type { Logger } from 'pino';
import type { DocumentService } from '../notion/document-service.js';
import { placeholderFileUrl } from '../notion/document-service.js';
import { DefaultTextExtractor } from '../extract/text-extractor.js';
import type { TextExtractor } from '../extract/types.js';
import { chunkText } from './chunker.js';
import {
  AccessError,
  ExtractionError,
  MirrorAbortedError,
  RemoteServiceError,
  describeError,
} from './errors.js';
import { isTextKind } from './file-kind.js';
import { assertReadable, listDirectory, statEntry } from './local-tree.js';
import type { LocalEntry, MirrorConfig, MirrorOptions, MirrorStats } from './types.js';
import { DEFAULT_MIRROR_CONFIG, createEmptyStats } from './types.js';

type FileEntry = Extract<LocalEntry, { type: 'file' }>;
type DirectoryEntry = Extract<LocalEntry, { type: 'directory' }>;

export interface MirrorWalkerOptions {
  service: DocumentService;
  logger: Logger;
  /** Defaults to DefaultTextExtractor */
  extractor?: TextExtractor;
  config?: Partial<MirrorConfig>;
}

export class MirrorWalker {
  private readonly service: DocumentService;
  private readonly extractor: TextExtractor;
  private readonly config: MirrorConfig;
  private readonly logger: Logger;
  private stats: MirrorStats = createEmptyStats();

  constructor(options: MirrorWalkerOptions) {
    this.service = options.service;
    this.extractor = options.extractor ?? new DefaultTextExtractor();
    this.config = { ...DEFAULT_MIRROR_CONFIG, ...options.config };
    this.logger = options.logger.child({ component: 'mirror-walker' });
  }

  /**
   * Counters for the most recent (or running) mirror call.
   */
  getStats(): MirrorStats {
    return { ...this.stats, failures: [...this.stats.failures] };
  }

  /**
   * Mirror `localPath` under the document `remoteParentId`.
   *
   * Returns the id of the document created for `localPath` itself. Problems
   * with the root always propagate; problems below it propagate under the
   * 'abort' policy and are recorded in getStats().failures under 'skip'.
   */
  async mirror(localPath: string, remoteParentId: string, options?: MirrorOptions): Promise<string> {
    this.stats = createEmptyStats();
    const signal = options?.signal;

    const root = await statEntry(localPath);
    if (root === null) {
      throw new AccessError(localPath, 'not a regular file or directory');
    }
    await assertReadable(localPath);

    this.logger.info(
      { path: localPath, parentId: remoteParentId, policy: this.config.onRemoteError },
      'Starting mirror'
    );

    const documentId = await this.mirrorEntry(root, remoteParentId, signal, new Set<string>());

    this.logger.info(
      {
        documents: this.stats.documentsCreated,
        textBlocks: this.stats.textBlocksAppended,
        fileBlocks: this.stats.fileBlocksAppended,
        fallbacks: this.stats.fallbacks,
        failures: this.stats.failures.length,
      },
      'Mirror complete'
    );

    return documentId;
  }

  private mirrorEntry(
    entry: LocalEntry,
    parentId: string,
    signal: AbortSignal | undefined,
    ancestors: ReadonlySet<string>
  ): Promise<string> {
    return entry.type === 'directory'
      ? this.mirrorDirectory(entry, parentId, signal, ancestors)
      : this.mirrorFile(entry, parentId, signal);
  }

  /**
   * `ancestors` holds the real paths of the directories above `entry`.
   */
  private async mirrorDirectory(
    entry: DirectoryEntry,
    parentId: string,
    signal: AbortSignal | undefined,
    ancestors: ReadonlySet<string>
  ): Promise<string> {
    // List before creating the page so an unreadable directory leaves nothing behind
    const listing = await listDirectory(entry.path, { includeHidden: this.config.includeHidden });
    if (listing.skipped.length > 0) {
      this.stats.skippedEntries += listing.skipped.length;
      this.logger.debug({ path: entry.path, skipped: listing.skipped }, 'Skipped entries');
    }

    const documentId = await this.remote(entry.path, signal, () =>
      this.service.createDocument(parentId, entry.name)
    );
    this.stats.documentsCreated++;
    this.logger.info({ path: entry.path, pageId: documentId }, 'Mirrored directory');

    const lineage = new Set(ancestors).add(entry.realPath);
    for (const child of listing.entries) {
      if (child.type === 'directory' && lineage.has(child.realPath)) {
        this.stats.skippedEntries++;
        this.logger.warn(
          { path: child.path, target: child.realPath },
          'Skipping directory link back to an ancestor'
        );
        continue;
      }
      await this.mirrorChild(child, documentId, signal, lineage);
    }

    return documentId;
  }

  private async mirrorChild(
    entry: LocalEntry,
    parentId: string,
    signal: AbortSignal | undefined,
    ancestors: ReadonlySet<string>
  ): Promise<void> {
    try {
      await this.mirrorEntry(entry, parentId, signal, ancestors);
    } catch (err) {
      if (this.config.onRemoteError === 'abort') {
        throw err;
      }
      if (!(err instanceof AccessError || err instanceof RemoteServiceError)) {
        throw err;
      }

      this.stats.failures.push({
        path: entry.path,
        error: err.name,
        message: err.message,
        operation: err instanceof RemoteServiceError ? err.operation : undefined,
        retryable: err instanceof RemoteServiceError ? err.retryable : false,
      });
      this.logger.warn({ path: entry.path, error: err.message }, 'Skipping subtree after failure');
    }
  }

  private async mirrorFile(entry: FileEntry, parentId: string, signal?: AbortSignal): Promise<string> {
    const text = await this.readText(entry);

    const documentId = await this.remote(entry.path, signal, () =>
      this.service.createDocument(parentId, entry.name)
    );
    this.stats.documentsCreated++;

    if (text === null) {
      const url = placeholderFileUrl(this.config.placeholderBaseUrl, entry.name);
      await this.remote(entry.path, signal, () =>
        this.service.appendFileBlock(documentId, entry.name, url)
      );
      this.stats.fileBlocksAppended++;
      this.logger.debug({ path: entry.path, pageId: documentId, url }, 'Mirrored file as reference');
      return documentId;
    }

    const chunks = chunkText(text, { splitAt: this.config.splitAt });
    if (chunks.length > 0) {
      try {
        await this.remote(entry.path, signal, () =>
          this.service.appendTextBlocks(documentId, chunks)
        );
      } catch (err) {
        if (err instanceof RemoteServiceError && err.blocksWritten) {
          this.stats.textBlocksAppended += err.blocksWritten;
          this.logger.error(
            { path: entry.path, pageId: documentId, written: err.blocksWritten, total: chunks.length },
            'Text document is incomplete'
          );
        }
        throw err;
      }
      this.stats.textBlocksAppended += chunks.length;
    }

    this.logger.debug(
      { path: entry.path, pageId: documentId, blocks: chunks.length },
      'Mirrored text file'
    );
    return documentId;
  }

  /**
   * Text content for a file, or null when it should be attached as a
   * file reference instead. A file that cannot be read throws AccessError.
   */
  private async readText(entry: FileEntry): Promise<string | null> {
    const { kind } = entry;

    if (kind === 'unsupported') {
      this.stats.fallbacks++;
      this.logger.warn({ path: entry.path }, 'Unsupported document format, attaching as file reference');
      return null;
    }

    if (!isTextKind(kind)) {
      return null;
    }

    if (entry.sizeBytes > this.config.maxTextFileBytes) {
      this.stats.fallbacks++;
      this.logger.warn(
        { path: entry.path, sizeBytes: entry.sizeBytes, limit: this.config.maxTextFileBytes },
        'Text file too large, attaching as file reference'
      );
      return null;
    }

    try {
      return await this.extractor.extract(entry.path, kind);
    } catch (err) {
      if (!(err instanceof ExtractionError)) {
        throw err;
      }
      this.stats.fallbacks++;
      this.logger.warn({ path: entry.path, error: err.message }, 'Text extraction failed, attaching as file reference');
      return null;
    }
  }

  /**
   * Run one remote call: honour the abort signal first, and log failures
   * with the local path they belong to.
   */
  private async remote<T>(localPath: string, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
    if (signal?.aborted) {
      throw new MirrorAbortedError(signal.reason);
    }
    try {
      return await call();
    } catch (err) {
      this.logger.error(
        {
          path: localPath,
          error: describeError(err),
          ...(err instanceof RemoteServiceError
            ? { operation: err.operation, status: err.status, retryable: err.retryable }
            : {}),
        },
        'Remote call failed'
      );
      throw err;
    }
  }
}
