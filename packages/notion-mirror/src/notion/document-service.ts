/**
 * The remote side of the mirror, as the walker sees it.
 *
 * Implementations: NotionDocumentService (real API), DryRunDocumentService
 * (logs only). Tests use an in-memory recorder.
 */

export interface DocumentService {
  /** Create a child document and return its id */
  createDocument(parentId: string, title: string): Promise<string>;
  /** Append one text block; `text.length` must not exceed the block limit */
  appendTextBlock(documentId: string, text: string): Promise<void>;
  /** Append text blocks in order */
  appendTextBlocks(documentId: string, texts: readonly string[]): Promise<void>;
  /** Append a file-reference block pointing at `url` */
  appendFileBlock(documentId: string, displayName: string, url: string): Promise<void>;
}

/**
 * Placeholder link for a file that is not uploaded anywhere.
 */
export function placeholderFileUrl(baseUrl: string, fileName: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${encodeURIComponent(fileName)}`;
}
