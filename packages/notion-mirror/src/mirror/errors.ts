/**
 * Error taxonomy for the folder mirror.
 *
 * - ConfigurationError: missing token, bad arguments. Raised before traversal.
 * - AccessError: a local path cannot be stat'ed or listed.
 * - ExtractionError: a text-like file could not be turned into text.
 *   The walker recovers by attaching a file-reference block instead.
 * - RemoteServiceError: a Notion call failed.
 * - MirrorAbortedError: the caller's AbortSignal fired mid-walk.
 */

export type MirrorErrorCode =
  | 'CONFIGURATION'
  | 'ACCESS'
  | 'EXTRACTION'
  | 'REMOTE_SERVICE'
  | 'ABORTED';

export class MirrorError extends Error {
  public readonly code: MirrorErrorCode;

  constructor(code: MirrorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MirrorError';
    this.code = code;
  }
}

export class ConfigurationError extends MirrorError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

export class AccessError extends MirrorError {
  public readonly path: string;

  constructor(localPath: string, reason: string, options?: { cause?: unknown }) {
    super('ACCESS', `Cannot access ${localPath}: ${reason}`, options);
    this.name = 'AccessError';
    this.path = localPath;
  }
}

export class ExtractionError extends MirrorError {
  public readonly path: string;

  constructor(localPath: string, reason: string, options?: { cause?: unknown }) {
    super('EXTRACTION', `Cannot extract text from ${localPath}: ${reason}`, options);
    this.name = 'ExtractionError';
    this.path = localPath;
  }
}

/** Which document service call failed */
export type RemoteOperation = 'createDocument' | 'appendTextBlocks' | 'appendFileBlock';

export interface RemoteServiceErrorDetails {
  operation: RemoteOperation;
  /** HTTP status, when the service answered */
  status?: number;
  /** Service-specific error code (e.g. "rate_limited") */
  notionCode?: string;
  /** Whether repeating the same call later may succeed */
  retryable: boolean;
  /** Blocks already written before a partial append failed */
  blocksWritten?: number;
  cause?: unknown;
}

export class RemoteServiceError extends MirrorError {
  public readonly operation: RemoteOperation;
  public readonly status: number | undefined;
  public readonly notionCode: string | undefined;
  public readonly retryable: boolean;
  public readonly blocksWritten: number | undefined;

  constructor(message: string, details: RemoteServiceErrorDetails) {
    super('REMOTE_SERVICE', message, { cause: details.cause });
    this.name = 'RemoteServiceError';
    this.operation = details.operation;
    this.status = details.status;
    this.notionCode = details.notionCode;
    this.retryable = details.retryable;
    this.blocksWritten = details.blocksWritten;
  }
}

export class MirrorAbortedError extends MirrorError {
  constructor(reason?: unknown) {
    super('ABORTED', `Mirror aborted: ${describeError(reason ?? 'signal fired')}`, { cause: reason });
    this.name = 'MirrorAbortedError';
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
