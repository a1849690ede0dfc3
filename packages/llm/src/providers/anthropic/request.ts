import type { Message, ProviderConfig } from '../../types/index.js';
import { partitionSystemMessages, type Turn } from '../../utils/messages.js';

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com';
export const ANTHROPIC_VERSION = '2023-06-01';

export type AnthropicMessagesRequest = {
  readonly model: string;
  readonly messages: ReadonlyArray<Turn>;
  /** Present only when the conversation held at least one System message. */
  readonly system?: string;
  readonly temperature: number;
  readonly max_tokens: number;
};

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: AnthropicMessagesRequest;
};

export type TranslateRequestOptions = {
  readonly baseUrl?: string;
  readonly systemSeparator?: string;
};

export function translateRequest(
  messages: ReadonlyArray<Message>,
  config: Readonly<ProviderConfig>,
  options: TranslateRequestOptions = {},
): RequestOutput {
  const url = `${options.baseUrl ?? ANTHROPIC_BASE_URL}/v1/messages`;
  const headers: Record<string, string> = {
    'x-api-key': config.apiKey,
    'anthropic-version': ANTHROPIC_VERSION,
    'Content-Type': 'application/json',
  };

  // Anthropic models system instructions out-of-band, never as a turn
  const { system, turns } = partitionSystemMessages(messages, options.systemSeparator);

  const body: AnthropicMessagesRequest = {
    model: config.model,
    messages: turns,
    ...(system !== undefined ? { system } : {}),
    temperature: config.temperature,
    max_tokens: config.maxTokens,
  };

  return { url, headers, body };
}
