import type { Message, Middleware, ProviderAdapter, ProviderConfig } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { AnthropicAdapter } from '../providers/anthropic/index.js';
import { OpenAIAdapter } from '../providers/openai/index.js';
import { executeMiddlewareChain } from './middleware.js';
import {
  DEFAULT_PROVIDER_ENV_VAR,
  detectProviders,
  type ClientConfig,
  type Env,
  type ProviderName,
  type ProviderOptions,
} from './config.js';

export type AdapterFactory = (config: ProviderConfig, options: ProviderOptions) => ProviderAdapter;

export const DEFAULT_ADAPTER_FACTORIES: Readonly<Record<ProviderName, AdapterFactory>> = {
  anthropic: (config, options) => new AnthropicAdapter(config, options),
  openai: (config, options) => new OpenAIAdapter(config, options),
};

export type SendOptions = {
  readonly provider?: string;
};

export class Client {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string | null;
  private readonly middlewares: ReadonlyArray<Middleware>;

  constructor(config: ClientConfig) {
    this.providers = config.providers;
    this.middlewares = config.middleware ?? [];

    // If no default provider specified and exactly one provider registered, use it as default
    if (config.defaultProvider === undefined) {
      const providerNames = Object.keys(config.providers);
      this.defaultProvider = providerNames.length === 1 ? providerNames[0] ?? null : null;
    } else {
      this.defaultProvider = config.defaultProvider;
    }
  }

  static fromEnv(
    env: Env = process.env,
    options?: {
      readonly adapterFactories?: Partial<Record<ProviderName, AdapterFactory>>;
      readonly middleware?: ReadonlyArray<Middleware>;
    },
  ): Client {
    const factories = { ...DEFAULT_ADAPTER_FACTORIES, ...options?.adapterFactories };
    const providers: Record<string, ProviderAdapter> = {};

    for (const detected of detectProviders(env)) {
      const factory = factories[detected.name];
      if (factory) {
        providers[detected.name] = factory(detected.config, detected.options);
      }
    }

    const defaultProvider = env[DEFAULT_PROVIDER_ENV_VAR];

    return new Client({
      providers,
      defaultProvider: defaultProvider && defaultProvider.length > 0 ? defaultProvider : undefined,
      middleware: options?.middleware,
    });
  }

  get providerNames(): ReadonlyArray<string> {
    return Object.keys(this.providers);
  }

  async send(messages: ReadonlyArray<Message>, options?: SendOptions): Promise<string> {
    const provider = this.resolveProvider(options);
    const adapter = this.providers[provider];

    if (!adapter) {
      throw new ConfigurationError(`provider '${provider}' not configured`);
    }

    return executeMiddlewareChain(
      this.middlewares,
      { provider, messages },
      (context) => adapter.send(context.messages),
    );
  }

  private resolveProvider(options?: SendOptions): string {
    if (options?.provider) {
      return options.provider;
    }

    if (this.defaultProvider) {
      return this.defaultProvider;
    }

    throw new ConfigurationError('no provider configured and no default set');
  }
}
