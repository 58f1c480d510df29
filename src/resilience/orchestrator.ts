import type { HttpTransport } from '../transport/http-transport.js';
import type { HttpRequest, StreamChunk } from '../types/common.js';
import { AssistantsError } from '../errors/error.js';
import { RateLimitError, APIError } from '../errors/categories.js';
import type { RequestHook, ResponseHook, ErrorHook, RetryHook, ResilienceHooks } from './hooks.js';

export interface ResilienceConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: boolean;
  circuitBreaker: {
    enabled: boolean;
    threshold: number;
    timeoutMs: number;
  };
}

export const DEFAULT_RESILIENCE_CONFIG: ResilienceConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
  jitter: true,
  circuitBreaker: {
    enabled: true,
    threshold: 5,
    timeoutMs: 30000,
  },
};

export type CircuitState = 'closed' | 'open' | 'half-open';

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureTime = 0;

  constructor(
    private readonly threshold: number,
    private readonly timeoutMs: number
  ) {}

  canExecute(): boolean {
    switch (this.state) {
      case 'closed':
        return true;
      case 'open':
        if (Date.now() - this.lastFailureTime > this.timeoutMs) {
          this.state = 'half-open';
          return true;
        }
        return false;
      case 'half-open':
        return true;
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.state = 'closed';
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open' || this.failureCount >= this.threshold) {
      this.state = 'open';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.lastFailureTime = 0;
  }
}

export interface ResilienceOrchestrator {
  request<T>(request: HttpRequest): Promise<T>;
  stream<T>(request: HttpRequest): AsyncIterable<StreamChunk<T>>;
}

export class DefaultResilienceOrchestrator implements ResilienceOrchestrator {
  private readonly circuitBreaker?: CircuitBreaker;
  private readonly hooks: {
    request: RequestHook[];
    response: ResponseHook[];
    error: ErrorHook[];
    retry: RetryHook[];
  } = { request: [], response: [], error: [], retry: [] };

  constructor(
    private readonly transport: HttpTransport,
    private readonly config: ResilienceConfig = DEFAULT_RESILIENCE_CONFIG
  ) {
    if (config.circuitBreaker.enabled) {
      this.circuitBreaker = new CircuitBreaker(
        config.circuitBreaker.threshold,
        config.circuitBreaker.timeoutMs
      );
    }
  }

  addRequestHook(hook: RequestHook): this {
    this.hooks.request.push(hook);
    return this;
  }

  addResponseHook(hook: ResponseHook): this {
    this.hooks.response.push(hook);
    return this;
  }

  addErrorHook(hook: ErrorHook): this {
    this.hooks.error.push(hook);
    return this;
  }

  addRetryHook(hook: RetryHook): this {
    this.hooks.retry.push(hook);
    return this;
  }

  /** Registers whichever callbacks the hook set defines. */
  use(hooks: ResilienceHooks): this {
    if (hooks.onRequest) this.addRequestHook(hooks.onRequest);
    if (hooks.onResponse) this.addResponseHook(hooks.onResponse);
    if (hooks.onError) this.addErrorHook(hooks.onError);
    if (hooks.onRetry) this.addRetryHook(hooks.onRetry);
    return this;
  }

  getCircuitState(): CircuitState | undefined {
    return this.circuitBreaker?.getState();
  }

  async request<T>(request: HttpRequest): Promise<T> {
    this.checkCircuitBreaker();

    for (let attempt = 0; ; attempt++) {
      try {
        await this.runRequestHooks(request, attempt);

        const startTime = Date.now();
        const result = await this.transport.request<T>(request);
        const duration = Date.now() - startTime;

        this.circuitBreaker?.recordSuccess();
        await this.runResponseHooks(request, result, duration, attempt);

        return result;
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.circuitBreaker?.recordFailure();
        await this.runErrorHooks(request, failure, attempt);

        if (!this.isRetryable(failure) || attempt >= this.config.maxRetries) {
          throw failure;
        }

        const delay = this.calculateDelay(attempt, failure);
        await this.runRetryHooks(request, delay, attempt);
        await this.sleep(delay);
      }
    }
  }

  /**
   * Streams are not retried: events already handed to the caller cannot be
   * taken back.
   */
  async *stream<T>(request: HttpRequest): AsyncIterable<StreamChunk<T>> {
    this.checkCircuitBreaker();

    const startTime = Date.now();
    await this.runRequestHooks(request, 0);

    let events = 0;
    try {
      for await (const chunk of this.transport.stream<T>(request)) {
        events++;
        yield chunk;
      }
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.circuitBreaker?.recordFailure();
      await this.runErrorHooks(request, failure, 0);
      throw failure;
    }

    this.circuitBreaker?.recordSuccess();
    await this.runResponseHooks(request, { events }, Date.now() - startTime, 0);
  }

  private checkCircuitBreaker(): void {
    if (this.circuitBreaker && !this.circuitBreaker.canExecute()) {
      throw new APIError('Circuit breaker is open', 503);
    }
  }

  private isRetryable(error: Error): boolean {
    return error instanceof AssistantsError && error.retryable;
  }

  private calculateDelay(attempt: number, error: Error): number {
    if (error instanceof RateLimitError && error.retryAfter) {
      return error.retryAfter * 1000;
    }

    const baseDelay = this.config.initialDelayMs * Math.pow(this.config.multiplier, attempt);
    const cappedDelay = Math.min(baseDelay, this.config.maxDelayMs);

    if (this.config.jitter) {
      const jitter = cappedDelay * 0.5 * (Math.random() - 0.5);
      return Math.round(cappedDelay + jitter);
    }

    return Math.round(cappedDelay);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private async runRequestHooks(request: HttpRequest, attempt: number): Promise<void> {
    for (const hook of this.hooks.request) {
      await hook(request, attempt);
    }
  }

  private async runResponseHooks(
    request: HttpRequest,
    response: unknown,
    duration: number,
    attempt: number
  ): Promise<void> {
    for (const hook of this.hooks.response) {
      await hook(request, response, duration, attempt);
    }
  }

  private async runErrorHooks(request: HttpRequest, error: Error, attempt: number): Promise<void> {
    for (const hook of this.hooks.error) {
      await hook(request, error, attempt);
    }
  }

  private async runRetryHooks(request: HttpRequest, delayMs: number, attempt: number): Promise<void> {
    for (const hook of this.hooks.retry) {
      await hook(request, delayMs, attempt);
    }
  }
}

export function createResilienceOrchestrator(
  transport: HttpTransport,
  config?: Partial<ResilienceConfig>
): DefaultResilienceOrchestrator {
  return new DefaultResilienceOrchestrator(transport, {
    ...DEFAULT_RESILIENCE_CONFIG,
    ...config,
  });
}
