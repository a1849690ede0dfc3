import { DeserializationError, EmptyResponseError } from '../../types/index.js';
import { isRecord, stringOrEmpty } from '../../utils/json.js';

export type ChatCompletionChoice = {
  readonly index: number;
  /** Null when the model produced no text, e.g. a refusal or tool call. */
  readonly content: string | null;
  readonly finishReason: string | null;
};

export type ChatCompletionResponse = {
  readonly id: string;
  readonly model: string;
  readonly choices: ReadonlyArray<ChatCompletionChoice>;
};

function invalid(detail: string, raw: unknown): DeserializationError {
  return new DeserializationError(
    `openai response did not match the Chat Completions schema: ${detail}`,
    'openai',
    raw,
  );
}

export function parseResponse(raw: unknown): ChatCompletionResponse {
  if (!isRecord(raw)) {
    throw invalid('expected an object', raw);
  }

  const rawChoices = raw['choices'];
  if (!Array.isArray(rawChoices)) {
    throw invalid('choices is not an array', raw);
  }

  const choices: Array<ChatCompletionChoice> = [];
  rawChoices.forEach((item: unknown, position) => {
    if (!isRecord(item)) {
      throw invalid(`choice ${position} is not an object`, raw);
    }
    const message = item['message'];
    if (!isRecord(message)) {
      throw invalid(`choice ${position} has no message`, raw);
    }
    const content = message['content'];
    if (typeof content !== 'string' && content !== null) {
      throw invalid(`choice ${position} message content is not a string`, raw);
    }
    const index = item['index'];
    const finishReason = item['finish_reason'];
    choices.push({
      index: typeof index === 'number' ? index : position,
      content,
      finishReason: typeof finishReason === 'string' ? finishReason : null,
    });
  });

  return {
    id: stringOrEmpty(raw['id']),
    model: stringOrEmpty(raw['model']),
    choices,
  };
}

/** Returns the message text of the first choice. */
export function translateResponse(raw: unknown): string {
  const response = parseResponse(raw);

  const first = response.choices[0];
  if (!first) {
    throw new EmptyResponseError('openai response contained no choices', 'openai', raw);
  }

  if (first.content === null) {
    throw new EmptyResponseError('openai first choice carried no message content', 'openai', raw);
  }

  return first.content;
}
