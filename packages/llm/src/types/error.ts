export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export type ProviderErrorKind =
  | 'timeout'
  | 'connection_failure'
  | 'authentication_failure'
  | 'rate_limit_exceeded'
  | 'http_failure'
  | 'deserialization_failure'
  | 'empty_response';

/**
 * Base of every failure a provider call can surface. Callers branch on
 * `kind` (or the subclass); the message is for humans and logs only.
 */
export abstract class ProviderError extends SDKError {
  abstract readonly kind: ProviderErrorKind;
  readonly provider: string;

  constructor(message: string, provider: string, cause?: Error) {
    super(message, cause);
    this.provider = provider;
  }
}

export class RequestTimeoutError extends ProviderError {
  override readonly kind = 'timeout';
  readonly timeoutMs: number;

  constructor(message: string, provider: string, timeoutMs: number) {
    super(message, provider);
    this.timeoutMs = timeoutMs;
  }
}

export class NetworkError extends ProviderError {
  override readonly kind = 'connection_failure';
}

export class AuthenticationError extends ProviderError {
  override readonly kind = 'authentication_failure';
  readonly statusCode: number;
  readonly body: string;

  constructor(message: string, provider: string, statusCode: number, body: string) {
    super(message, provider);
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class RateLimitError extends ProviderError {
  override readonly kind = 'rate_limit_exceeded';
  readonly statusCode: number;
  readonly body: string;
  /** Milliseconds the backend asked us to wait, from Retry-After. */
  readonly retryAfter: number | null;

  constructor(
    message: string,
    provider: string,
    statusCode: number,
    body: string,
    retryAfter: number | null = null,
  ) {
    super(message, provider);
    this.statusCode = statusCode;
    this.body = body;
    this.retryAfter = retryAfter;
  }
}

export class HttpError extends ProviderError {
  override readonly kind = 'http_failure';
  readonly statusCode: number;
  readonly body: string;

  constructor(message: string, provider: string, statusCode: number, body: string) {
    super(message, provider);
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class DeserializationError extends ProviderError {
  override readonly kind = 'deserialization_failure';
  readonly raw: unknown;

  constructor(message: string, provider: string, raw: unknown = null, cause?: Error) {
    super(message, provider, cause);
    this.raw = raw;
  }
}

export class EmptyResponseError extends ProviderError {
  override readonly kind = 'empty_response';
  readonly raw: unknown;

  constructor(message: string, provider: string, raw: unknown = null) {
    super(message, provider);
    this.raw = raw;
  }
}

export function isProviderError(value: unknown): value is ProviderError {
  return value instanceof ProviderError;
}
