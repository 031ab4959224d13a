/**
 * DocumentService backed by the Notion API.
 *
 * Pages map to documents; paragraph blocks carry text; external file blocks
 * carry file references. Every client failure surfaces as RemoteServiceError.
 */

import {
  Client,
  ClientErrorCode,
  LogLevel,
  isNotionClientError,
} from '@notionhq/client';
import type { Logger } from 'pino';
import { RemoteServiceError, describeError } from '../mirror/errors.js';
import type { RemoteOperation } from '../mirror/errors.js';
import { NOTION_TEXT_BLOCK_LIMIT, truncateText } from '../mirror/chunker.js';
import type { DocumentService } from './document-service.js';

type AppendChildrenParams = Parameters<Client['blocks']['children']['append']>[0];
type BlockRequest = AppendChildrenParams['children'][number];

/** Notion accepts up to 100 children per append; stay well below it */
export const MAX_BLOCKS_PER_REQUEST = 50;

/** Page titles share the rich text content limit */
const MAX_TITLE_LENGTH = NOTION_TEXT_BLOCK_LIMIT;

export interface NotionDocumentServiceOptions {
  /** Notion integration token */
  token: string;
  logger: Logger;
  /** Request timeout in ms (client default: 60000) */
  timeoutMs?: number;
  /** Pre-built client, mainly for tests */
  client?: Client;
}

export class NotionDocumentService implements DocumentService {
  private readonly client: Client;
  private readonly logger: Logger;

  constructor(options: NotionDocumentServiceOptions) {
    this.logger = options.logger.child({ component: 'notion' });
    this.client =
      options.client ??
      new Client({
        auth: options.token,
        timeoutMs: options.timeoutMs,
        logLevel: LogLevel.DEBUG,
        logger: (level, message, extraInfo) => {
          this.forwardClientLog(level, message, extraInfo);
        },
      });
  }

  async createDocument(parentId: string, title: string): Promise<string> {
    try {
      const page = await this.client.pages.create({
        parent: { page_id: parentId },
        properties: {
          title: {
            title: [{ type: 'text', text: { content: truncateText(title, MAX_TITLE_LENGTH) } }],
          },
        },
      });
      this.logger.debug({ parentId, pageId: page.id, title }, 'Created page');
      return page.id;
    } catch (err) {
      throw toRemoteServiceError('createDocument', err);
    }
  }

  async appendTextBlock(documentId: string, text: string): Promise<void> {
    await this.appendTextBlocks(documentId, [text]);
  }

  async appendTextBlocks(documentId: string, texts: readonly string[]): Promise<void> {
    const oversized = texts.findIndex((t) => t.length > NOTION_TEXT_BLOCK_LIMIT);
    if (oversized !== -1) {
      throw new RangeError(
        `Text block ${oversized} is ${texts[oversized]?.length ?? 0} characters; limit is ${NOTION_TEXT_BLOCK_LIMIT}`
      );
    }

    let written = 0;
    for (let i = 0; i < texts.length; i += MAX_BLOCKS_PER_REQUEST) {
      const batch = texts.slice(i, i + MAX_BLOCKS_PER_REQUEST).map(paragraphBlock);
      try {
        await this.client.blocks.children.append({ block_id: documentId, children: batch });
      } catch (err) {
        throw toRemoteServiceError('appendTextBlocks', err, written);
      }
      written += batch.length;
      this.logger.debug({ pageId: documentId, written, total: texts.length }, 'Appended text blocks');
    }
  }

  async appendFileBlock(documentId: string, displayName: string, url: string): Promise<void> {
    try {
      await this.client.blocks.children.append({
        block_id: documentId,
        children: [fileBlock(displayName, url)],
      });
      this.logger.debug({ pageId: documentId, url }, 'Appended file block');
    } catch (err) {
      throw toRemoteServiceError('appendFileBlock', err);
    }
  }

  private forwardClientLog(level: LogLevel, message: string, extraInfo: Record<string, unknown>): void {
    switch (level) {
      case LogLevel.ERROR:
        this.logger.error(extraInfo, message);
        break;
      case LogLevel.WARN:
        this.logger.warn(extraInfo, message);
        break;
      case LogLevel.INFO:
        this.logger.info(extraInfo, message);
        break;
      case LogLevel.DEBUG:
        this.logger.debug(extraInfo, message);
        break;
    }
  }
}

function paragraphBlock(text: string): BlockRequest {
  return {
    object: 'block',
    type: 'paragraph',
    paragraph: {
      rich_text: [{ type: 'text', text: { content: text } }],
    },
  };
}

function fileBlock(displayName: string, url: string): BlockRequest {
  return {
    object: 'block',
    type: 'file',
    file: {
      type: 'external',
      external: { url },
      caption: [{ type: 'text', text: { content: truncateText(displayName, NOTION_TEXT_BLOCK_LIMIT) } }],
    },
  };
}

/**
 * Map a Notion client failure to RemoteServiceError.
 * Rate limits, 5xx answers and client timeouts are retryable.
 */
export function toRemoteServiceError(
  operation: RemoteOperation,
  err: unknown,
  blocksWritten?: number
): RemoteServiceError {
  let status: number | undefined;
  let notionCode: string | undefined;
  let retryable = false;

  if (isNotionClientError(err)) {
    notionCode = err.code;
    status = 'status' in err ? err.status : undefined;
    retryable =
      err.code === ClientErrorCode.RequestTimeout ||
      status === 429 ||
      (status !== undefined && status >= 500);
  }

  const where = blocksWritten ? ` after ${blocksWritten} blocks were written` : '';
  return new RemoteServiceError(`Notion ${operation} failed${where}: ${describeError(err)}`, {
    operation,
    status,
    notionCode,
    retryable,
    blocksWritten,
    cause: err,
  });
}
