export { placeholderFileUrl } from './document-service.js';
export type { DocumentService } from './document-service.js';
export {
  NotionDocumentService,
  toRemoteServiceError,
  MAX_BLOCKS_PER_REQUEST,
} from './notion-document-service.js';
export type { NotionDocumentServiceOptions } from './notion-document-service.js';
export { DryRunDocumentService } from './dry-run-document-service.js';
export { normalizePageId } from './page-id.js';
