export type { RequestHook, ResponseHook, ErrorHook, RetryHook, ResilienceHooks, Logger, LoggingHooksOptions } from './hooks.js';
export { LoggingHooks, TelemetryHooks, extractOperation } from './hooks.js';

export type { ResilienceOrchestrator, ResilienceConfig, CircuitState } from './orchestrator.js';
export {
  DefaultResilienceOrchestrator,
  CircuitBreaker,
  DEFAULT_RESILIENCE_CONFIG,
  createResilienceOrchestrator,
} from './orchestrator.js';
