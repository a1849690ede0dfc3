import type {
  AdapterOptions,
  Middleware,
  ProviderAdapter,
  ProviderConfig,
} from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { MAX_TIMEOUT_MS } from '../utils/http.js';

export type ProviderName = 'anthropic' | 'openai';

export type Env = Readonly<Record<string, string | undefined>>;

export type ProviderEnvConfig = {
  readonly providerName: ProviderName;
  readonly prefix: string;
  readonly defaultModel: string;
};

export type ProviderOptionEnvConfig = {
  readonly envVar: string;
  readonly providerName: ProviderName;
  readonly option: 'baseUrl' | 'organization';
};

export type ProviderOptions = AdapterOptions & {
  readonly organization?: string;
};

export type DetectedProvider = {
  readonly name: ProviderName;
  readonly config: ProviderConfig;
  readonly options: ProviderOptions;
};

export type ClientConfig = {
  readonly providers: Record<string, ProviderAdapter>;
  readonly defaultProvider?: string;
  readonly middleware?: ReadonlyArray<Middleware>;
};

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4096;

export const DEFAULT_PROVIDER_ENV_CONFIGS: ReadonlyArray<ProviderEnvConfig> = [
  { providerName: 'openai', prefix: 'OPENAI', defaultModel: 'gpt-4o' },
  { providerName: 'anthropic', prefix: 'ANTHROPIC', defaultModel: 'claude-sonnet-4-5' },
];

export const DEFAULT_PROVIDER_OPTION_ENV_CONFIGS: ReadonlyArray<ProviderOptionEnvConfig> = [
  { envVar: 'OPENAI_BASE_URL', providerName: 'openai', option: 'baseUrl' },
  { envVar: 'OPENAI_ORG_ID', providerName: 'openai', option: 'organization' },
  { envVar: 'ANTHROPIC_BASE_URL', providerName: 'anthropic', option: 'baseUrl' },
];

export const TIMEOUT_ENV_VAR = 'LLM_TIMEOUT_MS';
export const DEFAULT_PROVIDER_ENV_VAR = 'LLM_DEFAULT_PROVIDER';

/** Masks all but the last four characters, for diagnostics. */
export function redactApiKey(apiKey: string): string {
  if (apiKey.length <= 4) {
    return '****';
  }
  return `****${apiKey.slice(-4)}`;
}

export type ProviderConfigInput = {
  readonly apiKey?: unknown;
  readonly model?: unknown;
  readonly temperature?: unknown;
  readonly maxTokens?: unknown;
};

/**
 * Checks a raw configuration and returns it typed. Error messages name the
 * offending field and never echo the key.
 */
export function validateProviderConfig(input: ProviderConfigInput): ProviderConfig {
  const { apiKey, model, temperature, maxTokens } = input;

  if (typeof apiKey !== 'string' || apiKey.trim().length === 0) {
    throw new ConfigurationError('apiKey must be a non-empty string');
  }
  if (typeof model !== 'string' || model.trim().length === 0) {
    throw new ConfigurationError('model must be a non-empty string');
  }
  if (typeof temperature !== 'number' || !Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new ConfigurationError(`temperature must be between 0.0 and 2.0, got ${String(temperature)}`);
  }
  if (typeof maxTokens !== 'number' || !Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ConfigurationError(`maxTokens must be a positive integer, got ${String(maxTokens)}`);
  }

  return { apiKey, model, temperature, maxTokens };
}

function readNumber(env: Env, envVar: string, fallback: number): number {
  const value = env[envVar];
  if (value === undefined || value.trim().length === 0) {
    return fallback;
  }
  return Number(value);
}

function envConfigFor(provider: ProviderName): ProviderEnvConfig {
  const envConfig = DEFAULT_PROVIDER_ENV_CONFIGS.find((c) => c.providerName === provider);
  if (!envConfig) {
    throw new ConfigurationError(`unknown provider '${provider}'`);
  }
  return envConfig;
}

/**
 * Reads `<PREFIX>_API_KEY`, `<PREFIX>_MODEL`, `<PREFIX>_TEMPERATURE` and
 * `<PREFIX>_MAX_TOKENS`; only the key is required.
 */
export function loadProviderConfig(provider: ProviderName, env: Env = process.env): ProviderConfig {
  const { prefix, defaultModel } = envConfigFor(provider);

  const apiKey = env[`${prefix}_API_KEY`];
  if (!apiKey) {
    throw new ConfigurationError(`${prefix}_API_KEY is not set`);
  }

  const model = env[`${prefix}_MODEL`];

  try {
    return validateProviderConfig({
      apiKey,
      model: model && model.length > 0 ? model : defaultModel,
      temperature: readNumber(env, `${prefix}_TEMPERATURE`, DEFAULT_TEMPERATURE),
      maxTokens: readNumber(env, `${prefix}_MAX_TOKENS`, DEFAULT_MAX_TOKENS),
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`${provider}: ${err.message}`, err);
    }
    throw err;
  }
}

export function loadTimeout(env: Env = process.env): number | undefined {
  const value = env[TIMEOUT_ENV_VAR];
  if (value === undefined || value.length === 0) {
    return undefined;
  }
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(
      `${TIMEOUT_ENV_VAR} must be an integer between 1 and ${MAX_TIMEOUT_MS}, got '${value}'`,
    );
  }
  return timeoutMs;
}

/** Every provider whose API key is present in the environment. */
export function detectProviders(env: Env = process.env): ReadonlyArray<DetectedProvider> {
  const timeoutMs = loadTimeout(env);
  const detected: Array<DetectedProvider> = [];

  for (const envConfig of DEFAULT_PROVIDER_ENV_CONFIGS) {
    const apiKey = env[`${envConfig.prefix}_API_KEY`];
    if (!apiKey || apiKey.length === 0) {
      continue;
    }

    const options: { baseUrl?: string; organization?: string; timeoutMs?: number } = {};
    if (timeoutMs !== undefined) {
      options.timeoutMs = timeoutMs;
    }
    for (const optionConfig of DEFAULT_PROVIDER_OPTION_ENV_CONFIGS) {
      const value = env[optionConfig.envVar];
      if (optionConfig.providerName === envConfig.providerName && value && value.length > 0) {
        options[optionConfig.option] = value;
      }
    }

    detected.push({
      name: envConfig.providerName,
      config: loadProviderConfig(envConfig.providerName, env),
      options,
    });
  }

  return detected;
}
