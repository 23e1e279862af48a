// ============================================================================
// Pipeline Error Types — one class per failure the run can meet
// ============================================================================
//
// Only ConfigError is allowed to escape the orchestrator. Everything else is
// caught per bundle and turned into an outcome record.
//
// Messages NEVER include document text.

/** Error codes for configuration failures */
export type ConfigErrorCode =
  | 'MISSING_ENV'
  | 'INVALID_ENV'
  | 'MISSING_CREDENTIALS'
  | 'AI_UNREACHABLE'
  | 'ARCHIVE_UNREACHABLE';

/**
 * Fatal for the whole run. Raised before any bundle work begins
 * (missing API key, unusable archive root, unreachable AI service).
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.code = code;
  }
}

/** Error codes for text extraction failures */
export type ExtractionErrorCode = 'EMPTY' | 'UNPARSEABLE' | 'ENCRYPTED';

/** One attachment could not be read as a PDF. Its bundle is skipped. */
export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;
  readonly filename: string;

  constructor(code: ExtractionErrorCode, filename: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
    this.code = code;
    this.filename = filename;
  }
}

/** Error codes for classification failures */
export type ClassificationErrorCode =
  | 'REQUEST_FAILED'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'MALFORMED_RESPONSE'
  | 'SCHEMA_MISMATCH';

/**
 * The AI call failed or answered with something that does not match the
 * verdict schema. Always retryable; this is not an "invalid" verdict.
 */
export class ClassificationError extends Error {
  readonly code: ClassificationErrorCode;

  constructor(code: ClassificationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassificationError';
    this.code = code;
  }
}

/**
 * Backend failure while creating folders or writing files.
 * `transient` failures (timeouts, 429, 5xx, connection resets) are retried;
 * the rest (401/403, EACCES) fail the item immediately.
 */
export class StorageError extends Error {
  readonly transient: boolean;
  readonly statusCode: number | null;

  constructor(
    message: string,
    transient: boolean,
    statusCode: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StorageError';
    this.transient = transient;
    this.statusCode = statusCode;
  }
}

/** Extracts a loggable message from anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
