import { randomUUID } from 'node:crypto';
import type { HttpRequest } from '../types/common.js';
import type { TelemetryEmitter } from '../telemetry/emitter.js';

export type RequestHook = (request: HttpRequest, attempt: number) => void | Promise<void>;
export type ResponseHook = (request: HttpRequest, response: unknown, durationMs: number, attempt: number) => void | Promise<void>;
export type ErrorHook = (request: HttpRequest, error: Error, attempt: number) => void | Promise<void>;
export type RetryHook = (request: HttpRequest, delayMs: number, attempt: number) => void | Promise<void>;

export interface ResilienceHooks {
  onRequest?: RequestHook;
  onResponse?: ResponseHook;
  onError?: ErrorHook;
  onRetry?: RetryHook;
}

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface LoggingHooksOptions {
  logRequests?: boolean;
  logResponses?: boolean;
  logErrors?: boolean;
  logRetries?: boolean;
  logger?: Logger;
}

export class LoggingHooks implements ResilienceHooks {
  private readonly logger: Logger;

  constructor(private readonly options: LoggingHooksOptions = {}) {
    this.logger = options.logger ?? console;
  }

  onRequest: RequestHook = (request, attempt) => {
    if (this.options.logRequests !== false) {
      this.logger.debug(`[Assistants] ${request.method} ${request.path} (attempt ${attempt + 1})`);
    }
  };

  onResponse: ResponseHook = (request, _response, durationMs, attempt) => {
    if (this.options.logResponses !== false) {
      this.logger.debug(`[Assistants] ${request.method} ${request.path} completed in ${durationMs}ms (attempt ${attempt + 1})`);
    }
  };

  onError: ErrorHook = (request, error, attempt) => {
    if (this.options.logErrors !== false) {
      this.logger.warn(`[Assistants] ${request.method} ${request.path} failed (attempt ${attempt + 1}): ${error.message}`);
    }
  };

  onRetry: RetryHook = (request, delayMs, attempt) => {
    if (this.options.logRetries !== false) {
      this.logger.info(`[Assistants] Retrying ${request.method} ${request.path} in ${delayMs}ms (attempt ${attempt + 2})`);
    }
  };
}

/**
 * Maps orchestrator callbacks onto telemetry events. One correlation id is
 * kept per request object across its retries.
 */
export class TelemetryHooks implements ResilienceHooks {
  private readonly correlationIds = new WeakMap<HttpRequest, string>();

  constructor(private readonly emitter: TelemetryEmitter) {}

  onRequest: RequestHook = (request, attempt) => {
    if (attempt !== 0) return;
    const correlationId = randomUUID();
    this.correlationIds.set(request, correlationId);
    this.emitter.emitRequestStart(this.details(request, correlationId), this.metadata(request, attempt));
  };

  onResponse: ResponseHook = (request, response, durationMs, attempt) => {
    const correlationId = this.correlationIds.get(request);
    if (!correlationId) return;

    const metadata = { ...this.metadata(request, attempt), durationMs };
    const usage = extractUsage(response);
    const details = this.details(request, correlationId);

    this.emitter.emitRequestComplete(details, usage ? { ...metadata, usage } : metadata);
    this.emitter.emitLatency(details, durationMs, metadata);
    this.correlationIds.delete(request);
  };

  onError: ErrorHook = (request, error, attempt) => {
    const correlationId = this.correlationIds.get(request);
    if (!correlationId) return;

    this.emitter.emitError(this.details(request, correlationId), error, {
      ...this.metadata(request, attempt),
      errorType: error.name,
    });
  };

  private details(request: HttpRequest, correlationId: string): { source: string; correlationId: string; model?: string } {
    return { source: extractOperation(request.path), correlationId, model: extractModel(request.body) };
  }

  private metadata(request: HttpRequest, attempt: number): Record<string, unknown> {
    return { method: request.method, path: request.path, attempt: attempt + 1 };
  }
}

export function extractOperation(path: string): string {
  if (/\/runs\/[^/]+\/steps/.test(path)) return 'assistants.run_steps';
  if (path.endsWith('/submit_tool_outputs')) return 'assistants.tool_outputs';
  if (/\/threads\/[^/]+\/runs/.test(path)) return 'assistants.runs';
  return 'assistants';
}

function extractModel(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'model' in body && typeof body.model === 'string') {
    return body.model;
  }
  return undefined;
}

function extractUsage(response: unknown): Record<string, unknown> | undefined {
  if (typeof response === 'object' && response !== null && 'usage' in response) {
    const usage = response.usage;
    if (typeof usage === 'object' && usage !== null) {
      return { ...usage };
    }
  }
  return undefined;
}
