import type { Message } from './message.js';

export type SendContext = {
  readonly provider: string;
  readonly messages: ReadonlyArray<Message>;
};

export type Middleware = (
  context: SendContext,
  next: (context: SendContext) => Promise<string>,
) => Promise<string>;
