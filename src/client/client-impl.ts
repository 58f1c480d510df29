import type { AssistantsClient } from './index.js';
import type { AssistantsConfig, NormalizedConfig } from './config.js';
import type { RunsService } from '../services/runs/index.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { RunsServiceImpl } from '../services/runs/index.js';
import { FetchHttpTransport } from '../transport/http-transport.js';
import { DefaultResilienceOrchestrator, DEFAULT_RESILIENCE_CONFIG } from '../resilience/orchestrator.js';
import { LoggingHooks, TelemetryHooks } from '../resilience/hooks.js';
import { TelemetryEmitter } from '../telemetry/emitter.js';
import { normalizeConfig } from './config.js';

export interface ClientDependencies {
  /** Replaces the fetch-based transport, e.g. with an in-memory fake. */
  transport?: HttpTransport;
  telemetryEmitter?: TelemetryEmitter;
}

/** Account headers sent with every call. The key is already checked by `normalizeConfig`. */
export function authHeaders(config: Pick<NormalizedConfig, 'apiKey' | 'organizationId' | 'projectId'>): Record<string, string> {
  const headers: Record<string, string> = { Authorization: `Bearer ${config.apiKey}` };
  if (config.organizationId) headers['OpenAI-Organization'] = config.organizationId;
  if (config.projectId) headers['OpenAI-Project'] = config.projectId;
  return headers;
}

export class AssistantsClientImpl implements AssistantsClient {
  public readonly runs: RunsService;

  private readonly config: NormalizedConfig;
  private readonly orchestrator: DefaultResilienceOrchestrator;
  private readonly telemetry?: TelemetryEmitter;

  constructor(config: AssistantsConfig, dependencies: ClientDependencies = {}) {
    this.config = normalizeConfig(config);

    const transport = dependencies.transport ?? new FetchHttpTransport(
      this.config.baseUrl,
      authHeaders(this.config),
      this.config.timeout
    );

    this.orchestrator = new DefaultResilienceOrchestrator(transport, {
      ...DEFAULT_RESILIENCE_CONFIG,
      maxRetries: this.config.maxRetries,
      initialDelayMs: this.config.retryDelay,
    });

    if (this.config.logger) {
      this.orchestrator.use(new LoggingHooks({ logger: this.config.logger }));
    }

    this.telemetry = dependencies.telemetryEmitter
      ?? (this.config.telemetry && new TelemetryEmitter({ ingestUrl: this.config.telemetry.ingestUrl }));
    if (this.telemetry) {
      this.orchestrator.use(new TelemetryHooks(this.telemetry));
    }

    this.runs = new RunsServiceImpl(this.orchestrator, {
      validateRequests: this.config.validateRequests,
    });
  }

  getConfig(): Readonly<NormalizedConfig> {
    return { ...this.config };
  }

  async flushTelemetry(): Promise<void> {
    await this.telemetry?.flush();
  }
}
