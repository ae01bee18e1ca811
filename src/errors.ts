/**
 * Error codes for knowledge-base failures.
 */
export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION = 'VALIDATION',
  DEPENDENCY_UNAVAILABLE = 'DEPENDENCY_UNAVAILABLE',
  CAPABILITY_TIMEOUT = 'CAPABILITY_TIMEOUT',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

export class KBError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'KBError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** A file or record a caller asked for does not exist. */
export class NotFoundError extends KBError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.NOT_FOUND, message, cause);
    this.name = 'NotFoundError';
  }
}

/** Bad input. Surfaced to the caller as-is and never retried. */
export class ValidationError extends KBError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.VALIDATION, message, cause);
    this.name = 'ValidationError';
  }
}

/**
 * An embedding or generation prerequisite is missing or unreachable.
 * Only thrown inside adapters; the fallback chains catch it.
 */
export class DependencyUnavailableError extends KBError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.DEPENDENCY_UNAVAILABLE, message, cause);
    this.name = 'DependencyUnavailableError';
  }
}

/** An external call ran past its time budget. */
export class CapabilityTimeoutError extends KBError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.CAPABILITY_TIMEOUT, message, cause);
    this.name = 'CapabilityTimeoutError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Map a failed fetch to the adapter error taxonomy.
 */
export function toCapabilityError(label: string, error: unknown): KBError {
  if (error instanceof KBError) return error;
  if (isAbortError(error)) {
    return new CapabilityTimeoutError(`${label} timed out`, error);
  }
  return new DependencyUnavailableError(`${label} unavailable: ${getErrorMessage(error)}`, error);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
