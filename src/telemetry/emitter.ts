/**
 * Fire-and-forget telemetry client.
 *
 * Events are POSTed as JSON to the configured ingest endpoint. Sends retry
 * with exponential backoff and never reject into the caller; `flush()` waits
 * for whatever is still in flight.
 */

import { request } from 'undici';
import type { TelemetryEvent, TelemetryEmitterConfig } from './types.js';

type EventDetails = Pick<TelemetryEvent, 'source' | 'correlationId' | 'model'>;

export class TelemetryEmitter {
  private readonly ingestUrl: string;
  private readonly maxRetries: number;
  private readonly initialRetryDelay: number;
  private readonly timeout: number;
  private readonly onFailure: (error: Error, event: TelemetryEvent) => void;
  private readonly pending = new Set<Promise<void>>();

  constructor(config: TelemetryEmitterConfig) {
    this.ingestUrl = config.ingestUrl;
    this.maxRetries = config.maxRetries ?? 2;
    this.initialRetryDelay = config.initialRetryDelay ?? 100;
    this.timeout = config.timeout ?? 5000;
    this.onFailure = config.onFailure ?? ((error, event) => {
      console.debug('[TelemetryEmitter] Failed to send event:', {
        error: error.message,
        eventType: event.eventType,
        correlationId: event.correlationId,
      });
    });
  }

  emit(event: TelemetryEvent): void {
    const send = this.sendWithRetry(event).catch((error: unknown) => {
      this.onFailure(error instanceof Error ? error : new Error(String(error)), event);
    });
    this.pending.add(send);
    void send.finally(() => this.pending.delete(send));
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  emitRequestStart(details: EventDetails, metadata: Record<string, unknown> = {}): void {
    this.emit({ ...details, eventType: 'request_start', timestamp: Date.now(), metadata });
  }

  emitRequestComplete(details: EventDetails, metadata: Record<string, unknown> = {}): void {
    this.emit({ ...details, eventType: 'request_complete', timestamp: Date.now(), metadata });
  }

  emitLatency(details: EventDetails, latencyMs: number, metadata: Record<string, unknown> = {}): void {
    this.emit({
      ...details,
      eventType: 'latency',
      timestamp: Date.now(),
      metadata: { ...metadata, latencyMs },
    });
  }

  emitError(details: EventDetails, error: Error, metadata: Record<string, unknown> = {}): void {
    this.emit({
      ...details,
      eventType: 'error',
      timestamp: Date.now(),
      metadata: {
        ...metadata,
        error: { message: error.message, name: error.name },
      },
    });
  }

  private async sendWithRetry(event: TelemetryEvent): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await this.sendEvent(event);
        return;
      } catch (error) {
        if (attempt >= this.maxRetries) throw error;
        await this.sleep(this.initialRetryDelay * Math.pow(2, attempt));
      }
    }
  }

  private async sendEvent(event: TelemetryEvent): Promise<void> {
    const response = await request(this.ingestUrl, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(event),
      bodyTimeout: this.timeout,
      headersTimeout: this.timeout,
    });

    // Drain so the connection goes back to the pool.
    await response.body.text();

    if (response.statusCode >= 400) {
      throw new Error(`HTTP ${response.statusCode}: ${response.statusCode >= 500 ? 'Server Error' : 'Client Error'}`);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
