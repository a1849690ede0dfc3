import type { AdapterOptions, Message, ProviderAdapter, ProviderConfig } from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { ANTHROPIC_BASE_URL, translateRequest } from './request.js';
import { translateResponse } from './response.js';

export class AnthropicAdapter implements ProviderAdapter {
  readonly name = 'anthropic';
  private readonly config: ProviderConfig;
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly systemSeparator: string | undefined;

  constructor(config: ProviderConfig, options?: AdapterOptions) {
    this.config = config;
    this.baseUrl = options?.baseUrl || ANTHROPIC_BASE_URL;
    this.timeoutMs = options?.timeoutMs;
    this.systemSeparator = options?.systemSeparator;
  }

  async send(messages: ReadonlyArray<Message>): Promise<string> {
    const { url, headers, body } = translateRequest(messages, this.config, {
      baseUrl: this.baseUrl,
      systemSeparator: this.systemSeparator,
    });

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeoutMs: this.timeoutMs,
      provider: this.name,
    });

    return translateResponse(result.body);
  }
}

export { translateRequest, translateResponse };
export type { AnthropicMessagesRequest } from './request.js';
export type { AnthropicMessagesResponse, AnthropicContentBlock } from './response.js';
