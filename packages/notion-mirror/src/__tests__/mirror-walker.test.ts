/**
 * Tests for the mirror walker (mirror/mirror-walker.ts)
 *
 * Covers:
 * - Page creation order (single combined alphabetical pass, recursive)
 * - Text chunking into blocks, empty files
 * - File kind dispatch: text, binary, legacy .doc, extraction failures
 * - Root access errors before any remote call
 * - Directory links back to an ancestor
 * - 'abort' vs 'skip' failure policies
 * - Abort signal handling
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { MirrorWalker } from '../mirror/mirror-walker.js';
import {
  AccessError,
  ExtractionError,
  MirrorAbortedError,
  RemoteServiceError,
} from '../mirror/errors.js';
import type { MirrorConfig } from '../mirror/types.js';
import type { TextExtractor } from '../extract/types.js';
import { RecordingDocumentService, createTestLogger } from './helpers/recording-service.js';

let tmpDir: string;
let service: RecordingDocumentService;
let logger: ReturnType<typeof createTestLogger>;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'notion-mirror-walker-'));
  service = new RecordingDocumentService();
  logger = createTestLogger();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

/** Create a file under tmpDir with the given relative path and content. */
function createFile(relativePath: string, content: string | Buffer): string {
  const absPath = path.join(tmpDir, relativePath);
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, content);
  return absPath;
}

function createDir(relativePath: string): string {
  const absPath = path.join(tmpDir, relativePath);
  fs.mkdirSync(absPath, { recursive: true });
  return absPath;
}

function makeWalker(config?: Partial<MirrorConfig>, extractor?: TextExtractor): MirrorWalker {
  return new MirrorWalker({ service, logger, config, extractor });
}

function remoteError(message: string, retryable = false, blocksWritten?: number): RemoteServiceError {
  return new RemoteServiceError(message, {
    operation: 'createDocument',
    status: retryable ? 429 : 400,
    retryable,
    blocksWritten,
  });
}

describe('MirrorWalker', () => {
  describe('tree shape and ordering', () => {
    it('mirrors a small tree in a single alphabetical pass', async () => {
      createFile('root/a.txt', 'x'.repeat(3000));
      createFile('root/sub/b.md', 'hello');

      const rootId = await makeWalker().mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.calls).toEqual([
        { op: 'createDocument', parentId: 'P', title: 'root', id: 'doc-1' },
        { op: 'createDocument', parentId: 'doc-1', title: 'a.txt', id: 'doc-2' },
        { op: 'appendTextBlocks', documentId: 'doc-2', texts: ['x'.repeat(2000), 'x'.repeat(1000)] },
        { op: 'createDocument', parentId: 'doc-1', title: 'sub', id: 'doc-3' },
        { op: 'createDocument', parentId: 'doc-3', title: 'b.md', id: 'doc-4' },
        { op: 'appendTextBlocks', documentId: 'doc-4', texts: ['hello'] },
      ]);
      expect(rootId).toBe('doc-1');
    });

    it('interleaves files and directories by name, recursively', async () => {
      createFile('root/b.txt', 'b');
      createFile('root/a/z.txt', 'z');
      createFile('root/a/m/inner.txt', 'inner');
      createFile('root/c/y.txt', 'y');
      createFile('root/B.png', 'png');

      await makeWalker().mirror(path.join(tmpDir, 'root'), 'P');

      // Code-unit order: uppercase sorts before lowercase
      expect(service.createdTitles()).toEqual([
        'root',
        'B.png',
        'a',
        'm',
        'inner.txt',
        'z.txt',
        'b.txt',
        'c',
        'y.txt',
      ]);
    });

    it('creates every directory page before its children', async () => {
      createFile('root/one/two/three.txt', '3');

      await makeWalker().mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.documentFor('root')?.parentId).toBe('P');
      expect(service.documentFor('one')?.parentId).toBe(service.documentFor('root')?.id);
      expect(service.documentFor('two')?.parentId).toBe(service.documentFor('one')?.id);
      expect(service.documentFor('three.txt')?.parentId).toBe(service.documentFor('two')?.id);
    });

    it('creates a page for an empty directory', async () => {
      createDir('root/empty');

      await makeWalker().mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.createdTitles()).toEqual(['root', 'empty']);
    });

    it('mirrors a single file given as the root', async () => {
      const file = createFile('notes.txt', 'just me');

      const id = await makeWalker().mirror(file, 'P');

      expect(id).toBe('doc-1');
      expect(service.calls).toEqual([
        { op: 'createDocument', parentId: 'P', title: 'notes.txt', id: 'doc-1' },
        { op: 'appendTextBlocks', documentId: 'doc-1', texts: ['just me'] },
      ]);
    });

    it('skips hidden entries by default', async () => {
      createFile('root/.secret.txt', 'hidden');
      createFile('root/.git/config', 'cfg');
      createFile('root/visible.txt', 'shown');

      const walker = makeWalker();
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.createdTitles()).toEqual(['root', 'visible.txt']);
      expect(walker.getStats().skippedEntries).toBe(2);
    });

    it('includes hidden entries when includeHidden is set', async () => {
      createFile('root/.secret.txt', 'hidden');
      createFile('root/visible.txt', 'shown');

      await makeWalker({ includeHidden: true }).mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.createdTitles()).toEqual(['root', '.secret.txt', 'visible.txt']);
    });

    it('skips a directory link that points back to an ancestor', async () => {
      createFile('root/a.txt', 'a');
      const root = path.join(tmpDir, 'root');
      fs.symlinkSync(root, path.join(root, 'loop'), 'dir');

      const walker = makeWalker();
      await walker.mirror(root, 'P');

      expect(service.createdTitles()).toEqual(['root', 'a.txt']);
      expect(walker.getStats().skippedEntries).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { path: path.join(root, 'loop'), target: fs.realpathSync(root) },
        'Skipping directory link back to an ancestor'
      );
    });

    it('skips a link to a grandparent found deeper in the tree', async () => {
      createFile('root/sub/inner.txt', 'inner');
      const root = path.join(tmpDir, 'root');
      fs.symlinkSync(root, path.join(root, 'sub', 'up'), 'dir');

      await makeWalker().mirror(root, 'P');

      expect(service.createdTitles()).toEqual(['root', 'sub', 'inner.txt']);
    });

    it('follows a directory link to a folder outside the tree', async () => {
      createFile('other/o.txt', 'o');
      createDir('root');
      fs.symlinkSync(path.join(tmpDir, 'other'), path.join(tmpDir, 'root', 'link'), 'dir');

      await makeWalker().mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.createdTitles()).toEqual(['root', 'link', 'o.txt']);
      expect(service.textBlocksFor('o.txt')).toEqual(['o']);
    });
  });

  describe('file content', () => {
    it('creates a page with no blocks for an empty text file', async () => {
      createFile('root/empty.txt', '');

      await makeWalker().mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.documentFor('empty.txt')).toBeDefined();
      expect(service.calls.filter((c) => c.op !== 'createDocument')).toEqual([]);
    });

    it('attaches exactly one file block for unrecognised extensions', async () => {
      createFile('root/photo.png', Buffer.from([0x89, 0x50, 0x4e, 0x47]));

      const walker = makeWalker();
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.fileBlocksFor('photo.png')).toEqual([
        { displayName: 'photo.png', url: 'https://example.com/files/photo.png' },
      ]);
      expect(service.textBlocksFor('photo.png')).toEqual([]);
      expect(walker.getStats().fallbacks).toBe(0);
    });

    it('encodes file names in placeholder URLs', async () => {
      createFile('root/my photo #1.jpg', 'jpg');

      await makeWalker({ placeholderBaseUrl: 'https://files.test/base' }).mirror(
        path.join(tmpDir, 'root'),
        'P'
      );

      expect(service.fileBlocksFor('my photo #1.jpg')).toEqual([
        { displayName: 'my photo #1.jpg', url: 'https://files.test/base/my%20photo%20%231.jpg' },
      ]);
    });

    it('degrades legacy .doc files to a file block with a warning', async () => {
      createFile('root/legacy.doc', 'binary word data');

      const walker = makeWalker();
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.fileBlocksFor('legacy.doc')).toEqual([
        { displayName: 'legacy.doc', url: 'https://example.com/files/legacy.doc' },
      ]);
      expect(walker.getStats().fallbacks).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { path: path.join(tmpDir, 'root', 'legacy.doc') },
        'Unsupported document format, attaching as file reference'
      );
    });

    it('matches text extensions case-insensitively', async () => {
      createFile('root/README.MD', '# Title');

      await makeWalker().mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.textBlocksFor('README.MD')).toEqual(['# Title']);
    });

    it('falls back to a file block when text cannot be decoded', async () => {
      createFile('root/broken.txt', Buffer.from([0x61, 0xc3, 0x28]));
      createFile('root/fine.txt', 'ok');

      const walker = makeWalker();
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.fileBlocksFor('broken.txt')).toEqual([
        { displayName: 'broken.txt', url: 'https://example.com/files/broken.txt' },
      ]);
      expect(service.textBlocksFor('fine.txt')).toEqual(['ok']);
      expect(walker.getStats().fallbacks).toBe(1);
    });

    it('uses the injected extractor and recovers from its ExtractionError', async () => {
      createFile('root/doc.rtf', '{\\rtf1 hi}');
      createFile('root/notes.md', 'plain');
      const extractor: TextExtractor = {
        async extract(filePath, kind) {
          if (kind === 'rich-text') throw new ExtractionError(filePath, 'boom');
          return `extracted:${path.basename(filePath)}`;
        },
      };

      await makeWalker({}, extractor).mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.fileBlocksFor('doc.rtf')).toHaveLength(1);
      expect(service.textBlocksFor('notes.md')).toEqual(['extracted:notes.md']);
    });

    it('attaches text files above the size cap as file blocks', async () => {
      createFile('root/big.txt', 'y'.repeat(20));

      const walker = makeWalker({ maxTextFileBytes: 10 });
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.textBlocksFor('big.txt')).toEqual([]);
      expect(service.fileBlocksFor('big.txt')).toHaveLength(1);
      expect(walker.getStats().fallbacks).toBe(1);
    });

    it('splits at whitespace when configured', async () => {
      const text = 'a'.repeat(1500) + '\n' + 'b'.repeat(1000);
      createFile('root/long.txt', text);

      await makeWalker({ splitAt: 'whitespace' }).mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.textBlocksFor('long.txt')).toEqual(['a'.repeat(1500) + '\n', 'b'.repeat(1000)]);
    });

    it('counts pages and blocks', async () => {
      createFile('root/a.txt', 'x'.repeat(4500));
      createFile('root/b.png', 'png');

      const walker = makeWalker();
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(walker.getStats()).toEqual({
        documentsCreated: 3,
        textBlocksAppended: 3,
        fileBlocksAppended: 1,
        fallbacks: 0,
        skippedEntries: 0,
        failures: [],
      });
    });
  });

  describe('errors', () => {
    it('fails with AccessError before any remote call when the root is missing', async () => {
      const walker = makeWalker();

      await expect(walker.mirror(path.join(tmpDir, 'nope'), 'P')).rejects.toBeInstanceOf(AccessError);
      expect(service.calls).toEqual([]);
    });

    it('propagates a failure creating the root page even in skip mode', async () => {
      createFile('root/a.txt', 'a');
      service.failWhen = (call) =>
        call.op === 'createDocument' && call.title === 'root' ? remoteError('forbidden') : undefined;

      await expect(
        makeWalker({ onRemoteError: 'skip' }).mirror(path.join(tmpDir, 'root'), 'P')
      ).rejects.toThrow('forbidden');
      expect(service.calls).toEqual([]);
    });

    it('aborts the whole run on a remote error by default', async () => {
      createFile('root/bad/inner.txt', 'inner');
      createFile('root/good.txt', 'good');
      service.failWhen = (call) =>
        call.op === 'createDocument' && call.title === 'bad' ? remoteError('rate limited', true) : undefined;

      await expect(makeWalker().mirror(path.join(tmpDir, 'root'), 'P')).rejects.toBeInstanceOf(
        RemoteServiceError
      );
      expect(service.createdTitles()).toEqual(['root']);
      expect(logger.error).toHaveBeenCalledWith(
        {
          path: path.join(tmpDir, 'root', 'bad'),
          error: 'rate limited',
          operation: 'createDocument',
          status: 429,
          retryable: true,
        },
        'Remote call failed'
      );
    });

    it('skips the failing subtree and continues with siblings in skip mode', async () => {
      createFile('root/bad/inner.txt', 'inner');
      createFile('root/good.txt', 'good');
      service.failWhen = (call) =>
        call.op === 'createDocument' && call.title === 'bad' ? remoteError('rate limited', true) : undefined;

      const walker = makeWalker({ onRemoteError: 'skip' });
      const rootId = await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(rootId).toBe('doc-1');
      expect(service.createdTitles()).toEqual(['root', 'good.txt']);
      expect(walker.getStats().failures).toEqual([
        {
          path: path.join(tmpDir, 'root', 'bad'),
          error: 'RemoteServiceError',
          message: 'rate limited',
          operation: 'createDocument',
          retryable: true,
        },
      ]);
    });

    it('logs an incomplete text document when an append fails part-way', async () => {
      createFile('root/long.txt', 'z'.repeat(5000));
      service.failWhen = (call) =>
        call.op === 'appendTextBlocks'
          ? new RemoteServiceError('append failed', {
              operation: 'appendTextBlocks',
              status: 502,
              retryable: true,
              blocksWritten: 2,
            })
          : undefined;

      const walker = makeWalker({ onRemoteError: 'skip' });
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(logger.error).toHaveBeenCalledWith(
        { path: path.join(tmpDir, 'root', 'long.txt'), pageId: 'doc-2', written: 2, total: 3 },
        'Text document is incomplete'
      );
      expect(walker.getStats().textBlocksAppended).toBe(2);
      expect(walker.getStats().failures).toHaveLength(1);
    });

    it('fails with AccessError before any remote call when the root file cannot be read', async () => {
      const file = createFile('locked.txt', 'secret');
      const extractor: TextExtractor = {
        async extract(filePath) {
          throw new AccessError(filePath, 'EACCES: permission denied');
        },
      };

      await expect(
        makeWalker({ onRemoteError: 'skip' }, extractor).mirror(file, 'P')
      ).rejects.toThrow(`Cannot access ${file}: EACCES: permission denied`);
      expect(service.calls).toEqual([]);
    });

    it('records an unreadable child file in skip mode and creates no page for it', async () => {
      createFile('root/locked.txt', 'secret');
      createFile('root/open.txt', 'open');
      const extractor: TextExtractor = {
        async extract(filePath) {
          if (path.basename(filePath) === 'locked.txt') {
            throw new AccessError(filePath, 'EACCES: permission denied');
          }
          return 'open';
        },
      };

      const walker = makeWalker({ onRemoteError: 'skip' }, extractor);
      await walker.mirror(path.join(tmpDir, 'root'), 'P');

      expect(service.createdTitles()).toEqual(['root', 'open.txt']);
      expect(walker.getStats().fallbacks).toBe(0);
      expect(walker.getStats().failures).toEqual([
        {
          path: path.join(tmpDir, 'root', 'locked.txt'),
          error: 'AccessError',
          message: `Cannot access ${path.join(tmpDir, 'root', 'locked.txt')}: EACCES: permission denied`,
          operation: undefined,
          retryable: false,
        },
      ]);
    });

    it('does not isolate unexpected errors in skip mode', async () => {
      createFile('root/a.txt', 'a');
      const extractor: TextExtractor = {
        async extract() {
          throw new TypeError('bug');
        },
      };

      await expect(
        makeWalker({ onRemoteError: 'skip' }, extractor).mirror(path.join(tmpDir, 'root'), 'P')
      ).rejects.toThrow('bug');
    });
  });

  describe('cancellation', () => {
    it('makes no remote call when the signal is already aborted', async () => {
      createFile('root/a.txt', 'a');
      const controller = new AbortController();
      controller.abort(new Error('stop'));

      await expect(
        makeWalker().mirror(path.join(tmpDir, 'root'), 'P', { signal: controller.signal })
      ).rejects.toThrow('Mirror aborted: stop');
      expect(service.calls).toEqual([]);
    });

    it('stops mid-walk when the signal fires, keeping what was created', async () => {
      createFile('root/a.txt', 'a');
      createFile('root/b.txt', 'b');
      const controller = new AbortController();
      service.failWhen = (call) => {
        if (call.op === 'createDocument' && call.title === 'a.txt') controller.abort();
        return undefined;
      };

      const walker = makeWalker({ onRemoteError: 'skip' });
      await expect(
        walker.mirror(path.join(tmpDir, 'root'), 'P', { signal: controller.signal })
      ).rejects.toBeInstanceOf(MirrorAbortedError);
      expect(service.createdTitles()).toEqual(['root', 'a.txt']);
      expect(walker.getStats().documentsCreated).toBe(2);
    });
  });
});
