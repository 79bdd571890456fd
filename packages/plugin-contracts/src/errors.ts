/**
 * @module @sprig/plugin-contracts/errors
 *
 * Error taxonomy for the plugin host.
 *
 * Every failure a caller can observe is one of these classes, carrying a
 * stable `code` so hosts can branch without `instanceof` across realms.
 */

/**
 * Error codes enum for type safety
 */
export const ErrorCode = {
  UNKNOWN_LANGUAGE: 'UNKNOWN_LANGUAGE',
  FETCH_FAILED: 'FETCH_FAILED',
  MALFORMED_MODULE: 'MALFORMED_MODULE',
  UNSATISFIED_IMPORT: 'UNSATISFIED_IMPORT',
  INCOMPATIBLE_INTERFACE: 'INCOMPATIBLE_INTERFACE',
  MISSING_EXPORT: 'MISSING_EXPORT',
  INSTANTIATION_FAILED: 'INSTANTIATION_FAILED',
  EXECUTION_TRAP: 'EXECUTION_TRAP',
  EXECUTION_TIMEOUT: 'EXECUTION_TIMEOUT',
  MALFORMED_OUTPUT: 'MALFORMED_OUTPUT',
  ABORTED: 'ABORTED',
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type HighlightErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Codes produced while turning module bytes into a live instance.
 */
export type InstantiationErrorCode =
  | 'MALFORMED_MODULE'
  | 'UNSATISFIED_IMPORT'
  | 'INCOMPATIBLE_INTERFACE'
  | 'MISSING_EXPORT'
  | 'INSTANTIATION_FAILED';

const KNOWN_ERROR_CODES: Set<string> = new Set(Object.values(ErrorCode));

/**
 * Type guard for HighlightErrorCode.
 */
export function isKnownErrorCode(code: unknown): code is HighlightErrorCode {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

/**
 * Serialized error, safe to log or send across a process boundary
 */
export interface SerializedHighlightError {
  name: string;
  message: string;
  code: HighlightErrorCode;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base error class
 */
export class HighlightError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: HighlightErrorCode;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: HighlightErrorCode = 'INTERNAL_ERROR',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HighlightError';
    this.code = code;
    this.details = details;

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedHighlightError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * The catalog has no entry for the requested language. Not retried.
 */
export class UnknownLanguageError extends HighlightError {
  readonly languageId: string;

  constructor(languageId: string) {
    super(`Unknown language: ${languageId}`, 'UNKNOWN_LANGUAGE', { languageId });
    this.name = 'UnknownLanguageError';
    this.languageId = languageId;
  }
}

/**
 * Module bytes could not be obtained. The caller may retry.
 */
export class FetchFailureError extends HighlightError {
  readonly location: string;
  readonly status?: number;

  constructor(location: string, reason: string, options?: { status?: number; cause?: unknown }) {
    super(
      `Failed to fetch grammar module from ${location}: ${reason}`,
      'FETCH_FAILED',
      { location, status: options?.status },
      { cause: options?.cause }
    );
    this.name = 'FetchFailureError';
    this.location = location;
    this.status = options?.status;
  }
}

/**
 * Module bytes are malformed, or the module needs imports/exports the
 * declared contract version does not provide. A new module build is needed.
 */
export class InstantiationError extends HighlightError {
  readonly languageId?: string;

  constructor(
    message: string,
    code: InstantiationErrorCode = 'INSTANTIATION_FAILED',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, code, details, options);
    this.name = 'InstantiationError';
    const languageId = details?.languageId;
    this.languageId = typeof languageId === 'string' ? languageId : undefined;
  }
}

/**
 * The sandboxed call faulted or the module signalled a fatal exit.
 * The instance that raised it has been discarded.
 */
export class ExecutionTrapError extends HighlightError {
  readonly languageId: string;

  constructor(
    languageId: string,
    message: string,
    options?: { cause?: unknown; code?: 'EXECUTION_TRAP' | 'EXECUTION_TIMEOUT'; details?: Record<string, unknown> }
  ) {
    super(
      message,
      options?.code ?? 'EXECUTION_TRAP',
      { languageId, ...options?.details },
      { cause: options?.cause }
    );
    this.name = 'ExecutionTrapError';
    this.languageId = languageId;
  }
}

/**
 * The sandboxed call did not return within its bound.
 */
export class ExecutionTimeoutError extends ExecutionTrapError {
  readonly timeoutMs: number;

  constructor(languageId: string, timeoutMs: number) {
    super(languageId, `Highlighting ${languageId} timed out after ${timeoutMs}ms`, {
      code: 'EXECUTION_TIMEOUT',
      details: { timeoutMs },
    });
    this.name = 'ExecutionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Captures outside valid bounds. Never thrown by the host:
 * carried as a diagnostic next to a successful result.
 */
export class MalformedOutputError extends HighlightError {
  readonly dropped: number;
  readonly total: number;

  constructor(languageId: string, dropped: number, total: number, reason?: string) {
    super(
      `${languageId} produced ${dropped} of ${total} invalid captures${reason ? `: ${reason}` : ''}`,
      'MALFORMED_OUTPUT',
      { languageId, dropped, total }
    );
    this.name = 'MalformedOutputError';
    this.dropped = dropped;
    this.total = total;
  }
}

/**
 * Operation aborted via signal
 */
export class AbortError extends HighlightError {
  constructor(message: string = 'Operation aborted') {
    super(message, 'ABORTED');
    this.name = 'AbortError';
  }
}

/**
 * Invalid host configuration
 */
export class ConfigError extends HighlightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Check if an error is a HighlightError
 */
export function isHighlightError(error: unknown): error is HighlightError {
  return error instanceof HighlightError;
}

/**
 * Normalize any thrown value to the serialized error shape.
 *
 * - HighlightError: uses toJSON()
 * - other errors: keep message/stack, clamp unknown codes to INTERNAL_ERROR
 * - non-errors: converted to string
 */
export function normalizeError(error: unknown): SerializedHighlightError {
  if (isHighlightError(error)) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    const rawCode: unknown = Reflect.get(error, 'code');
    return {
      name: error.name,
      message: error.message,
      code: isKnownErrorCode(rawCode) ? rawCode : 'INTERNAL_ERROR',
      stack: error.stack,
    };
  }

  return {
    name: 'Error',
    message: String(error),
    code: 'INTERNAL_ERROR',
  };
}
