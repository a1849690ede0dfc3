import { describe, it, expect } from 'vitest';
import type { Middleware, SendContext } from '../types/index.js';
import { userMessage } from '../types/index.js';
import { executeMiddlewareChain } from './middleware.js';

describe('executeMiddlewareChain', () => {
  const context: SendContext = {
    provider: 'test-provider',
    messages: [userMessage('hi')],
  };

  it('runs middleware in onion order around the handler', async () => {
    const log: string[] = [];

    const tracing = (label: string): Middleware => async (ctx, next) => {
      log.push(`${label}-before`);
      const result = await next(ctx);
      log.push(`${label}-after`);
      return result;
    };

    const result = await executeMiddlewareChain([tracing('mw1'), tracing('mw2')], context, async () => {
      log.push('handler');
      return 'reply';
    });

    expect(result).toBe('reply');
    expect(log).toEqual(['mw1-before', 'mw2-before', 'handler', 'mw2-after', 'mw1-after']);
  });

  it('calls the handler directly with no middleware', async () => {
    const result = await executeMiddlewareChain([], context, async (ctx) => ctx.provider);

    expect(result).toBe('test-provider');
  });

  it('lets middleware rewrite the context and the reply', async () => {
    const rewrite: Middleware = async (ctx, next) => {
      const reply = await next({ ...ctx, messages: [...ctx.messages, userMessage('extra')] });
      return reply.toUpperCase();
    };

    const result = await executeMiddlewareChain([rewrite], context, async (ctx) =>
      ctx.messages.map((m) => m.content).join(','),
    );

    expect(result).toBe('HI,EXTRA');
  });

  it('propagates handler rejections through the chain', async () => {
    const passthrough: Middleware = (ctx, next) => next(ctx);

    await expect(
      executeMiddlewareChain([passthrough], context, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });
});
