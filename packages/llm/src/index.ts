export * from './types/index.js';
export { AnthropicAdapter } from './providers/anthropic/index.js';
export type {
  AnthropicMessagesRequest,
  AnthropicMessagesResponse,
  AnthropicContentBlock,
} from './providers/anthropic/index.js';
export { OpenAIAdapter } from './providers/openai/index.js';
export type {
  ChatCompletionRequest,
  ChatCompletionMessage,
  ChatCompletionResponse,
  ChatCompletionChoice,
  OpenAIAdapterOptions,
} from './providers/openai/index.js';
export { Client, DEFAULT_ADAPTER_FACTORIES } from './client/client.js';
export type { AdapterFactory, SendOptions } from './client/client.js';
export {
  validateProviderConfig,
  loadProviderConfig,
  loadTimeout,
  detectProviders,
  redactApiKey,
} from './client/config.js';
export type {
  ClientConfig,
  DetectedProvider,
  Env,
  ProviderConfigInput,
  ProviderName,
  ProviderOptions,
} from './client/config.js';
export { getDefaultClient, setDefaultClient, resetDefaultClient } from './client/default-client.js';
export { executeMiddlewareChain } from './client/middleware.js';
export { createLoggingMiddleware, consoleLogger } from './client/logging.js';
export type { Logger, LogEntry, LogEvent } from './client/logging.js';
export { runStep } from './api/run-step.js';
export type { RunStepOptions } from './api/run-step.js';
export { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './utils/http.js';
export { partitionSystemMessages, DEFAULT_SYSTEM_SEPARATOR } from './utils/messages.js';
export type { Turn, PartitionedMessages } from './utils/messages.js';
