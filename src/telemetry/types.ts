export type EventType = 'request_start' | 'request_complete' | 'error' | 'latency';

export interface TelemetryEvent {
  /** Shared by every event of one logical request, retries included. */
  correlationId: string;
  /** Emitting component, e.g. "assistants.runs". */
  source: string;
  /** Model named in the request body, when there is one. */
  model?: string;
  eventType: EventType;
  /** Unix milliseconds. */
  timestamp: number;
  metadata: Record<string, unknown>;
}

export interface TelemetryEmitterConfig {
  ingestUrl: string;
  /** Default 2. */
  maxRetries?: number;
  /** Default 100ms, doubled per retry. */
  initialRetryDelay?: number;
  /** Default 5000ms. */
  timeout?: number;
  /** Receives send failures once retries are exhausted. Defaults to console. */
  onFailure?: (error: Error, event: TelemetryEvent) => void;
}
