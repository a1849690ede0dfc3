import type { AdapterOptions, Message, ProviderConfig, SystemMessageMode } from '../../types/index.js';
import { partitionSystemMessages } from '../../utils/messages.js';

export const OPENAI_BASE_URL = 'https://api.openai.com';

export type ChatCompletionMessage = {
  readonly role: 'system' | 'user' | 'assistant';
  readonly content: string;
};

export type ChatCompletionRequest = {
  readonly model: string;
  readonly messages: ReadonlyArray<ChatCompletionMessage>;
  readonly temperature: number;
  readonly max_tokens: number;
};

export type OpenAIAdapterOptions = AdapterOptions & {
  /** Defaults to `inline`: Chat Completions accepts system turns in place. */
  readonly systemMessages?: SystemMessageMode;
  readonly organization?: string;
};

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: ChatCompletionRequest;
};

function translateMessages(
  messages: ReadonlyArray<Message>,
  mode: SystemMessageMode,
  separator: string | undefined,
): Array<ChatCompletionMessage> {
  if (mode === 'inline') {
    return messages.map((message) => ({ role: message.role, content: message.content }));
  }

  // Extracted instructions lead the conversation as one merged system turn
  const { system, turns } = partitionSystemMessages(messages, separator);
  const translated: Array<ChatCompletionMessage> = [];
  if (system !== undefined) {
    translated.push({ role: 'system', content: system });
  }
  for (const turn of turns) {
    translated.push({ role: turn.role, content: turn.content });
  }
  return translated;
}

export function translateRequest(
  messages: ReadonlyArray<Message>,
  config: Readonly<ProviderConfig>,
  options: Omit<OpenAIAdapterOptions, 'timeoutMs'> = {},
): RequestOutput {
  const url = `${options.baseUrl ?? OPENAI_BASE_URL}/v1/chat/completions`;
  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.apiKey}`,
    'Content-Type': 'application/json',
  };
  if (options.organization) {
    headers['OpenAI-Organization'] = options.organization;
  }

  const body: ChatCompletionRequest = {
    model: config.model,
    messages: translateMessages(messages, options.systemMessages ?? 'inline', options.systemSeparator),
    temperature: config.temperature,
    max_tokens: config.maxTokens,
  };

  return { url, headers, body };
}
