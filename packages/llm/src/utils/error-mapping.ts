import {
  AuthenticationError,
  HttpError,
  RateLimitError,
  type ProviderError,
} from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
};

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): parsed as int and converted to ms
 * - HTTP date string: computed as delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

/**
 * Maps a non-2xx response to the error taxonomy. Only 401 and 429 get
 * dedicated kinds; every other status keeps its code on an HttpError.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, headers } = options;

  switch (statusCode) {
    case 401:
      return new AuthenticationError(
        `${provider} authentication failed: ${body}`,
        provider,
        statusCode,
        body,
      );

    case 429:
      return new RateLimitError(
        `${provider} rate limit exceeded: ${body}`,
        provider,
        statusCode,
        body,
        parseRetryAfter(headers),
      );

    default:
      return new HttpError(
        `${provider} HTTP ${statusCode}: ${body}`,
        provider,
        statusCode,
        body,
      );
  }
}
