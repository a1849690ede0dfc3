import { DeserializationError, EmptyResponseError } from '../../types/index.js';
import { isRecord, stringOrEmpty } from '../../utils/json.js';

export type AnthropicContentBlock = {
  readonly type: string;
  readonly text: string | undefined;
};

export type AnthropicMessagesResponse = {
  readonly id: string;
  readonly model: string;
  readonly content: ReadonlyArray<AnthropicContentBlock>;
  readonly stopReason: string | null;
};

function invalid(detail: string, raw: unknown): DeserializationError {
  return new DeserializationError(
    `anthropic response did not match the Messages schema: ${detail}`,
    'anthropic',
    raw,
  );
}

export function parseResponse(raw: unknown): AnthropicMessagesResponse {
  if (!isRecord(raw)) {
    throw invalid('expected an object', raw);
  }

  const rawContent = raw['content'];
  if (!Array.isArray(rawContent)) {
    throw invalid('content is not an array', raw);
  }

  const content: Array<AnthropicContentBlock> = [];
  for (const item of rawContent) {
    if (!isRecord(item)) {
      throw invalid('content block is not an object', raw);
    }
    const type = item['type'];
    if (typeof type !== 'string') {
      throw invalid('content block without a type', raw);
    }
    const text = item['text'];
    content.push({
      type,
      text: typeof text === 'string' ? text : undefined,
    });
  }

  const stopReason = raw['stop_reason'];

  return {
    id: stringOrEmpty(raw['id']),
    model: stringOrEmpty(raw['model']),
    content,
    stopReason: typeof stopReason === 'string' ? stopReason : null,
  };
}

/** Returns the text of the first content block. */
export function translateResponse(raw: unknown): string {
  const response = parseResponse(raw);

  const first = response.content[0];
  if (!first) {
    throw new EmptyResponseError('anthropic response contained no content', 'anthropic', raw);
  }

  if (first.text === undefined) {
    throw invalid(`first content block of type '${first.type}' has no text`, raw);
  }

  return first.text;
}
