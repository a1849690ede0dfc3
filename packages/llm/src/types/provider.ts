import type { Message } from './message.js';

/**
 * Uniform contract every backend adapter implements. `send` issues exactly
 * one request and resolves with the text of the first returned choice, or
 * rejects with a {@link ProviderError}. Nothing is retried here.
 */
export interface ProviderAdapter {
  readonly name: string;
  send(messages: ReadonlyArray<Message>): Promise<string>;
}
