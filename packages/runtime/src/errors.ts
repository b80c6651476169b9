// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 * Never retried automatically; the caller must fix the input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when an observation references a segment that does not exist.
 */
export class UnknownSegmentError extends RuntimeError {
  readonly segmentId: number;

  constructor(segmentId: number) {
    super('UNKNOWN_SEGMENT', `Segment not found: ${segmentId}`);
    this.name = 'UnknownSegmentError';
    this.segmentId = segmentId;
  }
}

/**
 * Error when deleting a segment that observations still reference.
 */
export class SegmentInUseError extends RuntimeError {
  readonly segmentId: number;

  constructor(segmentId: number) {
    super('SEGMENT_IN_USE', `Segment ${segmentId} is referenced by observations and cannot be deleted`);
    this.name = 'SegmentInUseError';
    this.segmentId = segmentId;
  }
}

/**
 * Error when the durable store cannot be reached.
 * Surfaced immediately; retry policy belongs to whoever triggered the operation.
 */
export class StoreUnavailableError extends RuntimeError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STORE_UNAVAILABLE', `Store unavailable during ${operation}: ${reason}`, { cause });
    this.name = 'StoreUnavailableError';
    this.operation = operation;
  }
}

/**
 * Error when a refresh is aborted before its snapshot was published.
 * The previously published snapshot remains in place.
 */
export class RefreshCancelledError extends RuntimeError {
  constructor() {
    super('REFRESH_CANCELLED', 'Refresh was cancelled before the new snapshot was published');
    this.name = 'RefreshCancelledError';
  }
}

/**
 * Error when environment configuration is invalid.
 */
export class ConfigError extends RuntimeError {
  readonly fieldErrors: Record<string, string[]>;

  constructor(fieldErrors: Record<string, string[]>) {
    const fields = Object.keys(fieldErrors).join(', ');
    super('CONFIG_ERROR', `Invalid environment configuration: ${fields}`);
    this.name = 'ConfigError';
    this.fieldErrors = fieldErrors;
  }
}
