// Custom error classes for consistent error handling

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(`Configuration error: ${message}`, 500, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Base for every failure surfaced by a chat provider. The provider name is the
 * only envelope added on top of the underlying cause.
 */
export class ProviderError extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, details?: unknown, code = 'PROVIDER_ERROR') {
    super(`${provider}: ${message}`, 502, code, details);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

/** Transport-level failure: DNS, connect, TLS, timeout or caller abort. */
export class NetworkError extends ProviderError {
  constructor(provider: string, cause: string) {
    super(provider, `Network error: ${cause}`, undefined, 'NETWORK_ERROR');
    this.name = 'NetworkError';
  }
}

/** Upstream answered with a non-2xx status. */
export class ApiError extends ProviderError {
  public readonly status: number;

  constructor(provider: string, status: number) {
    super(provider, `API request failed: ${status}`, { status }, 'API_ERROR');
    this.name = 'ApiError';
    this.status = status;
  }
}

/** Upstream body was not the expected vendor shape, or carried no reply. */
export class ParseError extends ProviderError {
  constructor(provider: string, message: string, fragment?: string) {
    super(provider, `Parse error: ${message}`, fragment === undefined ? undefined : { fragment }, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export type ChatError = NetworkError | ApiError | ParseError;

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isChatError(error: unknown): error is ChatError {
  return error instanceof NetworkError || error instanceof ApiError || error instanceof ParseError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
