export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'MISSING_CREDENTIALS'
  | 'TOKEN_MALFORMED'
  | 'TOKEN_SIGNATURE_INVALID'
  | 'TOKEN_EXPIRED'
  | 'RATE_LIMIT_EXCEEDED'
  | 'CACHE_BACKEND_UNAVAILABLE'
  | 'INVALID_CACHE_KEY'
  | 'NOT_INITIALIZED'
  | 'CLOSED'
  | 'INTERNAL_ERROR';

export type AuthenticationFailure = 'Missing' | 'Malformed' | 'SignatureInvalid' | 'Expired';

export class GatewayError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Startup only: a process that hits this must not serve traffic.
export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
  }
}

const AUTH_CODES: Record<AuthenticationFailure, ErrorCode> = {
  Missing: 'MISSING_CREDENTIALS',
  Malformed: 'TOKEN_MALFORMED',
  SignatureInvalid: 'TOKEN_SIGNATURE_INVALID',
  Expired: 'TOKEN_EXPIRED',
};

export class AuthenticationError extends GatewayError {
  constructor(
    readonly kind: AuthenticationFailure,
    message: string,
  ) {
    super(AUTH_CODES[kind], message);
  }
}

export class RateLimitExceeded extends GatewayError {
  readonly remaining = 0;

  constructor(
    readonly limit: number,
    readonly resetAt: number,
    readonly retryAfterSeconds: number,
  ) {
    super('RATE_LIMIT_EXCEEDED', `Rate limit exceeded. Try again in ${retryAfterSeconds} seconds.`);
  }
}

export class CacheBackendUnavailable extends GatewayError {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super('CACHE_BACKEND_UNAVAILABLE', `Persistent cache tier unavailable during ${operation}`, { cause });
  }
}

export class InvalidCacheKeyError extends GatewayError {
  constructor(
    readonly key: string,
    reason: string,
  ) {
    super('INVALID_CACHE_KEY', `Invalid cache key "${key}": ${reason}`);
  }
}

export class NotInitializedError extends GatewayError {
  constructor(component: string) {
    super('NOT_INITIALIZED', `${component} has not been initialized`);
  }
}

export class ClosedError extends GatewayError {
  constructor(component: string) {
    super('CLOSED', `${component} is closed`);
  }
}

export type ErrorEnvelope = {
  detail: string;
  error_code: ErrorCode;
  timestamp: string;
};

// Fixed table the HTTP boundary honors.
export const ERROR_STATUS: Record<ErrorCode, number> = {
  CONFIGURATION_ERROR: 500,
  MISSING_CREDENTIALS: 401,
  TOKEN_MALFORMED: 401,
  TOKEN_SIGNATURE_INVALID: 401,
  TOKEN_EXPIRED: 401,
  RATE_LIMIT_EXCEEDED: 429,
  CACHE_BACKEND_UNAVAILABLE: 200,
  INVALID_CACHE_KEY: 400,
  NOT_INITIALIZED: 503,
  CLOSED: 503,
  INTERNAL_ERROR: 500,
};

const EXPOSED_CODES = new Set<ErrorCode>([
  'MISSING_CREDENTIALS',
  'TOKEN_MALFORMED',
  'TOKEN_SIGNATURE_INVALID',
  'TOKEN_EXPIRED',
  'RATE_LIMIT_EXCEEDED',
  'INVALID_CACHE_KEY',
]);

export function toErrorEnvelope(error: unknown, now: number): { status: number; body: ErrorEnvelope } {
  const timestamp = new Date(now).toISOString();
  if (error instanceof GatewayError && EXPOSED_CODES.has(error.code)) {
    return {
      status: ERROR_STATUS[error.code],
      body: { detail: error.message, error_code: error.code, timestamp },
    };
  }
  if (error instanceof NotInitializedError || error instanceof ClosedError) {
    return {
      status: ERROR_STATUS[error.code],
      body: { detail: 'Service unavailable', error_code: error.code, timestamp },
    };
  }
  return {
    status: ERROR_STATUS.INTERNAL_ERROR,
    body: { detail: 'Internal server error', error_code: 'INTERNAL_ERROR', timestamp },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
