import {
  DeserializationError,
  NetworkError,
  RequestTimeoutError,
} from '../types/error.js';
import { mapHttpError } from './error-mapping.js';

export const DEFAULT_TIMEOUT_MS = 60_000;
/** Largest delay setTimeout honours; anything above fires after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type FetchOptions = {
  readonly url: string;
  readonly provider: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeoutMs?: number;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Performs a single JSON request with a per-call deadline. Every failure is
 * rethrown as a ProviderError subclass: deadline as RequestTimeoutError,
 * unreachable endpoint as NetworkError, non-2xx through mapHttpError, and an
 * unparseable body as DeserializationError.
 */
export async function fetchWithTimeout(options: FetchOptions): Promise<FetchResult> {
  const {
    url,
    provider,
    method = 'POST',
    headers: customHeaders = {},
    body: bodyData,
    timeoutMs: requestedTimeoutMs = DEFAULT_TIMEOUT_MS,
  } = options;
  const timeoutMs = Math.min(requestedTimeoutMs, MAX_TIMEOUT_MS);

  const timeoutController = new AbortController();
  const timeoutId = setTimeout(() => {
    timeoutController.abort();
  }, timeoutMs);

  const fail = (err: unknown, phase: string): never => {
    if (timeoutController.signal.aborted) {
      throw new RequestTimeoutError(
        `${provider} request timed out after ${timeoutMs}ms`,
        provider,
        timeoutMs,
      );
    }
    const cause = err instanceof Error ? err : undefined;
    throw new NetworkError(
      `${provider} ${phase} failed: ${cause?.message ?? String(err)}`,
      provider,
      cause,
    );
  };

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: timeoutController.signal,
      });
    } catch (err) {
      return fail(err, 'request');
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      return fail(err, 'response read');
    }

    if (!response.ok) {
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        provider,
        headers: response.headers,
      });
    }

    let parsedBody: unknown;
    try {
      parsedBody = JSON.parse(text);
    } catch (err) {
      throw new DeserializationError(
        `${provider} returned a body that is not valid JSON`,
        provider,
        text,
        err instanceof Error ? err : undefined,
      );
    }

    return {
      response,
      body: parsedBody,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
