/**
 * DocumentService that only logs what would be sent to Notion.
 */

import type { Logger } from 'pino';
import type { DocumentService } from './document-service.js';

export class DryRunDocumentService implements DocumentService {
  private readonly logger: Logger;
  private nextId = 1;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'dry-run' });
  }

  async createDocument(parentId: string, title: string): Promise<string> {
    const id = `dry-run-${this.nextId++}`;
    this.logger.info({ parentId, pageId: id, title }, 'Would create page');
    return id;
  }

  async appendTextBlock(documentId: string, text: string): Promise<void> {
    await this.appendTextBlocks(documentId, [text]);
  }

  async appendTextBlocks(documentId: string, texts: readonly string[]): Promise<void> {
    const characters = texts.reduce((sum, t) => sum + t.length, 0);
    this.logger.info({ pageId: documentId, blocks: texts.length, characters }, 'Would append text blocks');
  }

  async appendFileBlock(documentId: string, displayName: string, url: string): Promise<void> {
    this.logger.info({ pageId: documentId, displayName, url }, 'Would append file block');
  }
}
