import type { Message, ProviderAdapter, ProviderConfig } from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { OPENAI_BASE_URL, translateRequest, type OpenAIAdapterOptions } from './request.js';
import { translateResponse } from './response.js';

export class OpenAIAdapter implements ProviderAdapter {
  readonly name = 'openai';
  private readonly config: ProviderConfig;
  private readonly options: OpenAIAdapterOptions;

  constructor(config: ProviderConfig, options?: OpenAIAdapterOptions) {
    this.config = config;
    this.options = {
      ...options,
      baseUrl: options?.baseUrl || OPENAI_BASE_URL,
    };
  }

  async send(messages: ReadonlyArray<Message>): Promise<string> {
    const { timeoutMs, ...translateOptions } = this.options;
    const { url, headers, body } = translateRequest(messages, this.config, translateOptions);

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeoutMs,
      provider: this.name,
    });

    return translateResponse(result.body);
  }
}

export { translateRequest, translateResponse };
export type { ChatCompletionRequest, ChatCompletionMessage, OpenAIAdapterOptions } from './request.js';
export type { ChatCompletionResponse, ChatCompletionChoice } from './response.js';
