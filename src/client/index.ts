import type { NormalizedConfig } from './config.js';
import type { RunsService } from '../services/runs/index.js';

export interface AssistantsClient {
  readonly runs: RunsService;

  getConfig(): Readonly<NormalizedConfig>;
  /** Resolves once queued telemetry events have been sent or dropped. */
  flushTelemetry(): Promise<void>;
}

export { AssistantsClientImpl, authHeaders, type ClientDependencies } from './client-impl.js';
export { createClient, createClientFromEnv } from './factory.js';
export { validateConfig, normalizeConfig, configFromEnv, DEFAULT_CONFIG } from './config.js';
export type { AssistantsConfig, NormalizedConfig, TelemetryConfig } from './config.js';
