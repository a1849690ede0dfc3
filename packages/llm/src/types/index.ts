export type { Role, Message } from './message.js';
export { systemMessage, userMessage, assistantMessage } from './message.js';
export type { ProviderAdapter } from './provider.js';
export type {
  ProviderConfig,
  TransportOptions,
  SystemMessageMode,
  AdapterOptions,
} from './config.js';
export type { StepResult, ExecutionResult } from './execution.js';
export { stepSuccess, stepFailure } from './execution.js';
export type { SendContext, Middleware } from './middleware.js';
export type { ProviderErrorKind } from './error.js';
export {
  SDKError,
  ConfigurationError,
  ProviderError,
  RequestTimeoutError,
  NetworkError,
  AuthenticationError,
  RateLimitError,
  HttpError,
  DeserializationError,
  EmptyResponseError,
  isProviderError,
} from './error.js';
