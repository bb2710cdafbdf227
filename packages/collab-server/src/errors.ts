/**
 * CollabError - structured error for the collaboration server
 */

/**
 * Error codes raised by the collaboration server
 */
export type CollabErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'OUT_OF_BAND_CHANGE'
  | 'DOCUMENT_NOT_FOUND'
  | 'UNSUPPORTED_DOCUMENT_TYPE'
  | 'ROOM_EXISTS'
  | 'PROTOCOL_ERROR'
  | 'SESSION_EXPIRED'
  | 'CONFIG_INVALID';

const DEFAULTS: Record<CollabErrorCode, { status: number; message: string }> = {
  NOT_FOUND: { status: 404, message: 'Resource not found' },
  INVALID_REQUEST: { status: 400, message: 'Invalid request' },
  UNAUTHORIZED: { status: 403, message: 'Authentication required' },
  OUT_OF_BAND_CHANGE: { status: 409, message: 'File changed on disk since it was last read' },
  DOCUMENT_NOT_FOUND: { status: 404, message: 'No stored updates for this document' },
  UNSUPPORTED_DOCUMENT_TYPE: { status: 400, message: 'Unsupported document type' },
  ROOM_EXISTS: { status: 409, message: 'Room already exists' },
  PROTOCOL_ERROR: { status: 400, message: 'Malformed message' },
  SESSION_EXPIRED: { status: 410, message: 'Document session expired' },
  CONFIG_INVALID: { status: 500, message: 'Invalid configuration' },
};

/**
 * Options for creating a CollabError
 */
export interface CollabErrorOptions {
  /** The error code */
  code: CollabErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: unknown;
}

/**
 * Error class carrying a code, an HTTP status and debugging context.
 *
 * @example
 * ```typescript
 * throw new CollabError({
 *   code: 'NOT_FOUND',
 *   message: `File 'notes.md' does not exist`,
 *   context: { path: 'notes.md' },
 * });
 * ```
 */
export class CollabError extends Error {
  /** Error code */
  readonly code: CollabErrorCode;

  /** HTTP status used when the error reaches a caller */
  readonly status: number;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  constructor(options: CollabErrorOptions) {
    const defaults = DEFAULTS[options.code];
    super(options.message ?? defaults.message, { cause: options.cause });

    this.name = 'CollabError';
    this.code = options.code;
    this.status = defaults.status;
    this.context = options.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CollabError);
    }
  }

  /**
   * Check whether a value is a CollabError, optionally with a given code
   */
  static isCode(error: unknown, code?: CollabErrorCode): error is CollabError {
    return error instanceof CollabError && (code === undefined || error.code === code);
  }

  /**
   * Serialize for an HTTP response body
   */
  toJSON(): { code: CollabErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}
