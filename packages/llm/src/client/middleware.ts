import type { Middleware, SendContext } from '../types/index.js';

export function executeMiddlewareChain(
  middlewares: ReadonlyArray<Middleware>,
  context: SendContext,
  handler: (context: SendContext) => Promise<string>,
): Promise<string> {
  // Build the chain from the inside out so the first-registered middleware
  // runs first on the way in and last on the way out (onion model)
  let chain: (context: SendContext) => Promise<string> = handler;

  for (let i = middlewares.length - 1; i >= 0; i--) {
    const mw = middlewares[i];
    if (!mw) continue;
    const nextChain = chain;

    chain = (ctx: SendContext) => mw(ctx, nextChain);
  }

  return chain(context);
}
