/**
 * Indexer error taxonomy
 *
 * Adapters translate driver and RPC failures into these classes at the
 * boundary so the indexing loop can decide what aborts a tick and what
 * terminates a poller.
 */

export type IndexerErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "DECODE_ERROR"
  | "LOG_PARSE_ERROR"
  | "UNSUPPORTED_TRANSACTION_ENCODING"
  | "STORAGE_ERROR"
  | "INVALID_CONFIGURATION";

export class IndexerError extends Error {
  readonly code: IndexerErrorCode;

  constructor(code: IndexerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** RPC / network failure reaching the transaction source (retryable) */
export class SourceUnavailableError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SOURCE_UNAVAILABLE", message, options);
  }
}

/** Known discriminant, but the payload does not match the event layout */
export class DecodeError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DECODE_ERROR", message, options);
  }
}

/** Marker present, but the text after it is not a valid base64 envelope */
export class LogParseError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("LOG_PARSE_ERROR", message, options);
  }
}

export class UnsupportedTransactionEncodingError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("UNSUPPORTED_TRANSACTION_ENCODING", message, options);
  }
}

export class StorageError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_ERROR", message, options);
  }
}

export class InvalidConfigurationError extends IndexerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIGURATION", message, options);
  }
}

/**
 * Fatal errors terminate a poller; everything else only aborts the current tick.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof InvalidConfigurationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
