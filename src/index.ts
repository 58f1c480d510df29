export type { AssistantsClient, AssistantsConfig, NormalizedConfig, TelemetryConfig, ClientDependencies } from './client/index.js';
export {
  AssistantsClientImpl,
  authHeaders,
  createClient,
  createClientFromEnv,
  validateConfig,
  normalizeConfig,
  configFromEnv,
  DEFAULT_CONFIG,
} from './client/index.js';

export type {
  RequestOptions,
  PaginationParams,
  PaginatedResponse,
  Usage,
  ApiError,
  HttpRequest,
  StreamChunk,
} from './types/index.js';

export {
  AssistantsError,
  isAssistantsError,
  InvalidArgumentError,
  ConfigurationError,
  StreamError,
  AuthenticationError,
  RateLimitError,
  InvalidRequestError,
  APIError,
  APIConnectionError,
  TimeoutError,
  ConflictError,
  NotFoundError,
  UnprocessableEntityError,
  PermissionDeniedError,
  InternalServerError,
  mapHttpError,
} from './errors/index.js';

export type { HttpTransport } from './transport/index.js';
export { FetchHttpTransport, RequestBuilder, parseSSEStream } from './transport/index.js';

export type {
  RequestHook,
  ResponseHook,
  ErrorHook,
  RetryHook,
  ResilienceHooks,
  Logger,
  ResilienceOrchestrator,
  ResilienceConfig,
  CircuitState,
} from './resilience/index.js';
export {
  LoggingHooks,
  TelemetryHooks,
  DefaultResilienceOrchestrator,
  CircuitBreaker,
  DEFAULT_RESILIENCE_CONFIG,
  createResilienceOrchestrator,
} from './resilience/index.js';

export type { TelemetryEvent, TelemetryEmitterConfig } from './telemetry/index.js';
export { TelemetryEmitter } from './telemetry/index.js';

export * from './services/runs/index.js';
