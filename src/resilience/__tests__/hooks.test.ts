import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LoggingHooks, TelemetryHooks, extractOperation } from '../hooks.js';
import { TelemetryEmitter } from '../../telemetry/emitter.js';
import type { TelemetryEvent } from '../../telemetry/types.js';
import { createMockLogger, type MockLogger } from '../../__mocks__/index.js';
import type { HttpRequest } from '../../types/common.js';

const createRun: HttpRequest = {
  method: 'POST',
  path: '/v1/threads/thread_1/runs',
  body: { assistant_id: 'asst_1', model: 'gpt-4o' },
};

describe('LoggingHooks', () => {
  let logger: MockLogger;
  let hooks: LoggingHooks;

  beforeEach(() => {
    logger = createMockLogger();
    hooks = new LoggingHooks({ logger });
  });

  it('should log requests and responses at debug', () => {
    hooks.onRequest(createRun, 0);
    hooks.onResponse(createRun, {}, 120, 0);

    expect(logger.debug.mock.calls).toEqual([
      ['[Assistants] POST /v1/threads/thread_1/runs (attempt 1)'],
      ['[Assistants] POST /v1/threads/thread_1/runs completed in 120ms (attempt 1)'],
    ]);
  });

  it('should log failures at warn and retries at info', () => {
    hooks.onError(createRun, new Error('Rate limit reached.'), 0);
    hooks.onRetry(createRun, 1000, 0);

    expect(logger.warn).toHaveBeenCalledWith(
      '[Assistants] POST /v1/threads/thread_1/runs failed (attempt 1): Rate limit reached.'
    );
    expect(logger.info).toHaveBeenCalledWith('[Assistants] Retrying POST /v1/threads/thread_1/runs in 1000ms (attempt 2)');
  });

  it('should honour per-kind switches', () => {
    const quiet = new LoggingHooks({ logger, logRequests: false, logRetries: false });

    quiet.onRequest(createRun, 0);
    quiet.onRetry(createRun, 1000, 0);

    expect(logger.debug).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
  });
});

describe('TelemetryHooks', () => {
  let emitted: TelemetryEvent[];
  let hooks: TelemetryHooks;

  beforeEach(() => {
    emitted = [];
    const emitter = new TelemetryEmitter({ ingestUrl: 'http://telemetry.test/ingest' });
    vi.spyOn(emitter, 'emit').mockImplementation((event) => {
      emitted.push(event);
    });
    hooks = new TelemetryHooks(emitter);
  });

  it('should emit start, completion and latency under one correlation id', () => {
    hooks.onRequest(createRun, 0);
    hooks.onResponse(createRun, { id: 'run_1', usage: { total_tokens: 10 } }, 42, 0);

    expect(emitted.map((event) => event.eventType)).toEqual(['request_start', 'request_complete', 'latency']);
    const ids = new Set(emitted.map((event) => event.correlationId));
    expect(ids.size).toBe(1);

    expect(emitted[0]).toMatchObject({
      source: 'assistants.runs',
      model: 'gpt-4o',
      metadata: { method: 'POST', path: '/v1/threads/thread_1/runs', attempt: 1 },
    });
    expect(emitted[1]?.metadata).toEqual({
      method: 'POST',
      path: '/v1/threads/thread_1/runs',
      attempt: 1,
      durationMs: 42,
      usage: { total_tokens: 10 },
    });
    expect(emitted[2]?.metadata).toEqual({
      method: 'POST',
      path: '/v1/threads/thread_1/runs',
      attempt: 1,
      durationMs: 42,
      latencyMs: 42,
    });
  });

  it('should keep the correlation id across retries', () => {
    hooks.onRequest(createRun, 0);
    hooks.onError(createRun, new Error('Oops.'), 0);
    hooks.onRequest(createRun, 1);
    hooks.onResponse(createRun, {}, 10, 1);

    expect(emitted.map((event) => event.eventType)).toEqual(['request_start', 'error', 'request_complete', 'latency']);
    expect(new Set(emitted.map((event) => event.correlationId)).size).toBe(1);
    expect(emitted[1]?.metadata).toEqual({
      method: 'POST',
      path: '/v1/threads/thread_1/runs',
      attempt: 1,
      errorType: 'Error',
      error: { message: 'Oops.', name: 'Error' },
    });
  });

  it('should use a fresh correlation id per request', () => {
    const other: HttpRequest = { method: 'GET', path: '/v1/threads/thread_1/runs/run_1' };

    hooks.onRequest(createRun, 0);
    hooks.onRequest(other, 0);

    expect(emitted[0]?.correlationId).not.toBe(emitted[1]?.correlationId);
    expect(emitted[1]?.model).toBeUndefined();
  });

  it('should ignore callbacks for requests it never saw start', () => {
    hooks.onResponse(createRun, {}, 10, 0);
    hooks.onError(createRun, new Error('Oops.'), 0);

    expect(emitted).toEqual([]);
  });
});

describe('extractOperation', () => {
  it.each([
    ['/v1/threads/thread_1/runs', 'assistants.runs'],
    ['/v1/threads/thread_1/runs/run_1/cancel', 'assistants.runs'],
    ['/v1/threads/thread_1/runs/run_1/submit_tool_outputs', 'assistants.tool_outputs'],
    ['/v1/threads/thread_1/runs/run_1/steps/step_1', 'assistants.run_steps'],
    ['/v1/assistants', 'assistants'],
  ])('should name %s as %s', (path, operation) => {
    expect(extractOperation(path)).toBe(operation);
  });
});
