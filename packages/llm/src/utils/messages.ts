import type { Message } from '../types/message.js';

export const DEFAULT_SYSTEM_SEPARATOR = '\n\n';

/** A non-system message, as every backend's turn list carries it. */
export type Turn = {
  readonly role: 'user' | 'assistant';
  readonly content: string;
};

export type PartitionedMessages = {
  /** Undefined when the input held no System message at all. */
  readonly system: string | undefined;
  readonly turns: ReadonlyArray<Turn>;
};

/**
 * Splits System messages out of a conversation. Their contents are joined
 * in encounter order; every other message keeps its position relative to
 * the rest.
 */
export function partitionSystemMessages(
  messages: ReadonlyArray<Message>,
  separator: string = DEFAULT_SYSTEM_SEPARATOR,
): PartitionedMessages {
  const systemParts: Array<string> = [];
  const turns: Array<Turn> = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join(separator) : undefined,
    turns,
  };
}
