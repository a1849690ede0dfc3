import type { Middleware } from '../types/index.js';
import { isProviderError } from '../types/index.js';

export type LogEvent = 'llm.request' | 'llm.response' | 'llm.error';

export type LogEntry = {
  readonly event: LogEvent;
  readonly provider: string;
  readonly [field: string]: string | number | boolean | null;
};

export type Logger = (entry: LogEntry) => void;

export const consoleLogger: Logger = (entry) => {
  console.error(JSON.stringify({ time: new Date().toISOString(), ...entry }));
};

/**
 * Logs one line before and one after every send. Message contents and
 * credentials are never written; only counts, lengths and error details.
 */
export function createLoggingMiddleware(
  logger: Logger = consoleLogger,
  now: () => number = Date.now,
): Middleware {
  return async (context, next) => {
    const start = now();
    logger({
      event: 'llm.request',
      provider: context.provider,
      messageCount: context.messages.length,
    });

    try {
      const text = await next(context);
      logger({
        event: 'llm.response',
        provider: context.provider,
        durationMs: now() - start,
        length: text.length,
      });
      return text;
    } catch (err) {
      logger({
        event: 'llm.error',
        provider: context.provider,
        durationMs: now() - start,
        kind: isProviderError(err) ? err.kind : null,
        statusCode: err !== null && typeof err === 'object' && 'statusCode' in err && typeof err.statusCode === 'number'
          ? err.statusCode
          : null,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  };
}
