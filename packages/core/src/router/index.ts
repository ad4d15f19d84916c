export {
  type ProviderId,
  type ProviderConfig,
  DEFAULT_LOCAL_BASE_URL,
  detectProvider,
  detectEmbeddingProvider,
  ProviderRegistry,
} from './providers.js';

export {
  type CompletionOptions,
  type ModelBackend,
  type GenerationSettings,
  LanguageModelBackend,
  createHostedBackend,
  createLocalBackend,
} from './llm.js';

export {
  type ModelCall,
  type BackendRetryEvent,
  type ResilientModelClientOptions,
  ResilientModelClient,
} from './model-client.js';

export {
  type ErrorCategory,
  type RetryConfig,
  type RetryResult,
  type AttemptFailure,
  TRANSIENT_CATEGORIES,
  DEFAULT_RETRY_CONFIG,
  classifyError,
  isTransient,
  backoffDelay,
  withRetry,
  withTimeout,
  sleep,
  RetryExhaustedError,
  TimeoutError,
  AbortError,
} from './retry.js';
