/**
 * Errors Module
 *
 * Failure taxonomy shared by the generation gateway, the renderer and the
 * documents facade. Every failure carries a stable machine-readable code and
 * a default transport status.
 */

// ============================================================================
// Types
// ============================================================================

export type FailureKind =
  | 'connectivity'
  | 'timeout'
  | 'authentication'
  | 'rate_limit'
  | 'generation'
  | 'configuration'
  | 'validation'
  | 'not_found';

export interface FailureOptions {
  /** Overrides the kind's default code */
  code?: string;
  /** Backend or engine the failure originated from */
  provider?: string;
  cause?: unknown;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

const FAILURE_DEFAULTS: Record<FailureKind, { code: string; status: number }> = {
  connectivity: { code: 'BACKEND_UNAVAILABLE', status: 503 },
  timeout: { code: 'BACKEND_TIMEOUT', status: 504 },
  authentication: { code: 'BACKEND_AUTH_ERROR', status: 401 },
  rate_limit: { code: 'BACKEND_RATE_LIMIT', status: 429 },
  generation: { code: 'GENERATION_ERROR', status: 500 },
  configuration: { code: 'CONFIGURATION_ERROR', status: 500 },
  validation: { code: 'VALIDATION_ERROR', status: 422 },
  not_found: { code: 'RESOURCE_NOT_FOUND', status: 404 },
};

export const DEFAULT_RETRY_AFTER_SECONDS = 60;

// ============================================================================
// Failure Classes
// ============================================================================

export class DocumentServiceError extends Error {
  readonly kind: FailureKind;
  readonly code: string;
  readonly status: number;
  readonly provider: string | undefined;

  constructor(kind: FailureKind, message: string, options: FailureOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.code = options.code ?? FAILURE_DEFAULTS[kind].code;
    this.status = FAILURE_DEFAULTS[kind].status;
    this.provider = options.provider;
  }
}

/** Backend unreachable. Retryable. */
export class ConnectivityFailure extends DocumentServiceError {
  constructor(message: string, options?: FailureOptions) {
    super('connectivity', message, options);
  }
}

/** Deadline exceeded. Retryable. */
export class TimeoutFailure extends DocumentServiceError {
  constructor(message: string, options?: FailureOptions) {
    super('timeout', message, options);
  }
}

export class AuthenticationFailure extends DocumentServiceError {
  constructor(message: string, options?: FailureOptions) {
    super('authentication', message, options);
  }
}

export class RateLimitFailure extends DocumentServiceError {
  readonly retryAfterSeconds: number;

  constructor(message: string, options: FailureOptions & { retryAfterSeconds?: number } = {}) {
    super('rate_limit', message, options);
    this.retryAfterSeconds = options.retryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS;
  }
}

/**
 * Malformed or empty provider response, or any other provider-side error.
 * Retryable only when its cause is.
 */
export class GenerationFailure extends DocumentServiceError {
  constructor(message: string, options?: FailureOptions) {
    super('generation', message, options);
  }
}

/** Missing template, unavailable render engine, invalid settings */
export class ConfigurationFailure extends DocumentServiceError {
  constructor(message: string, options?: FailureOptions) {
    super('configuration', message, options);
  }
}

export class ValidationFailure extends DocumentServiceError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], options?: FailureOptions) {
    super('validation', message, options);
    this.issues = issues;
  }
}

export class NotFoundFailure extends DocumentServiceError {
  constructor(message: string, options?: FailureOptions) {
    super('not_found', message, options);
  }
}

// ============================================================================
// Classification
// ============================================================================

export function isDocumentServiceError(error: unknown): error is DocumentServiceError {
  return error instanceof DocumentServiceError;
}

/**
 * Connectivity and timeout failures are retryable. A GenerationFailure is
 * retryable only when the failure that caused it is.
 */
export function isRetryableFailure(error: unknown): boolean {
  if (error instanceof ConnectivityFailure || error instanceof TimeoutFailure) {
    return true;
  }
  if (error instanceof GenerationFailure && error.cause !== undefined) {
    return isRetryableFailure(error.cause);
  }
  return false;
}

// ============================================================================
// Outer Boundary
// ============================================================================

export interface ErrorResponse {
  status: number;
  headers: Record<string, string>;
  body: {
    error: {
      code: string;
      message: string;
      details?: unknown;
    };
    trace_id: string | null;
  };
}

export interface ErrorResponseOptions {
  /** Append raw exception text for unexpected errors */
  debug?: boolean;
  traceId?: string;
}

const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

/**
 * Convert any thrown value into a transport-ready error response.
 * Unexpected errors never leak their text unless `debug` is set.
 */
export function toErrorResponse(error: unknown, options: ErrorResponseOptions = {}): ErrorResponse {
  const traceId = options.traceId ?? null;

  if (error instanceof DocumentServiceError) {
    const headers: Record<string, string> = {};
    if (error instanceof RateLimitFailure) {
      headers['Retry-After'] = String(error.retryAfterSeconds);
    }

    const body: ErrorResponse['body'] = {
      error: { code: error.code, message: error.message },
      trace_id: traceId,
    };
    if (error instanceof ValidationFailure && error.issues.length > 0) {
      body.error.details = error.issues;
    }

    return { status: error.status, headers, body };
  }

  const message =
    options.debug === true
      ? `${INTERNAL_ERROR_MESSAGE}: ${error instanceof Error ? error.message : String(error)}`
      : INTERNAL_ERROR_MESSAGE;

  return {
    status: 500,
    headers: {},
    body: {
      error: { code: 'INTERNAL_SERVER_ERROR', message },
      trace_id: traceId,
    },
  };
}
