import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { TelemetryEmitter } from '../emitter.js';
import type { TelemetryEvent } from '../types.js';

const ORIGIN = 'http://telemetry.test';
const INGEST_URL = `${ORIGIN}/ingest`;

describe('TelemetryEmitter', () => {
  let previous: Dispatcher;
  let agent: MockAgent;
  let bodies: string[];

  beforeEach(() => {
    previous = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    bodies = [];
  });

  afterEach(async () => {
    setGlobalDispatcher(previous);
    await agent.close();
  });

  /** Answers one send per status, in order, recording each body. */
  function intercept(...statuses: number[]): void {
    let call = 0;
    agent
      .get(ORIGIN)
      .intercept({ path: '/ingest', method: 'POST' })
      .reply((options) => {
        bodies.push(typeof options.body === 'string' ? options.body : '');
        const statusCode = statuses[call++] ?? 200;
        return { statusCode, data: statusCode < 400 ? { ok: true } : 'failed' };
      })
      .times(statuses.length);
  }

  it('should POST events as JSON', async () => {
    intercept(200);
    const emitter = new TelemetryEmitter({ ingestUrl: INGEST_URL });

    emitter.emitRequestStart(
      { source: 'assistants.runs', correlationId: 'corr-1', model: 'gpt-4o' },
      { method: 'POST' }
    );
    await emitter.flush();

    expect(bodies).toHaveLength(1);
    const event: unknown = JSON.parse(bodies[0] ?? '');
    expect(event).toMatchObject({
      source: 'assistants.runs',
      correlationId: 'corr-1',
      model: 'gpt-4o',
      eventType: 'request_start',
      metadata: { method: 'POST' },
    });
  });

  it('should describe errors and latency in metadata', async () => {
    intercept(202, 202);
    const emitter = new TelemetryEmitter({ ingestUrl: INGEST_URL });
    const details = { source: 'assistants.runs', correlationId: 'corr-2' };

    emitter.emitError(details, new TypeError('fetch failed'), { attempt: 1 });
    emitter.emitLatency(details, 250);
    await emitter.flush();

    const events = bodies.map((body): unknown => JSON.parse(body));
    expect(events).toContainEqual(
      expect.objectContaining({
        eventType: 'error',
        metadata: { attempt: 1, error: { message: 'fetch failed', name: 'TypeError' } },
      })
    );
    expect(events).toContainEqual(
      expect.objectContaining({ eventType: 'latency', metadata: { latencyMs: 250 } })
    );
  });

  it('should retry failed sends', async () => {
    intercept(503, 200);
    const onFailure = vi.fn<[Error, TelemetryEvent], void>();
    const emitter = new TelemetryEmitter({ ingestUrl: INGEST_URL, initialRetryDelay: 1, onFailure });

    emitter.emitRequestComplete({ source: 'assistants.runs', correlationId: 'corr-3' });
    await emitter.flush();

    expect(bodies).toHaveLength(2);
    expect(onFailure).not.toHaveBeenCalled();
    agent.assertNoPendingInterceptors();
  });

  it('should report a send that keeps failing', async () => {
    intercept(500, 500, 500);
    const onFailure = vi.fn<[Error, TelemetryEvent], void>();
    const emitter = new TelemetryEmitter({ ingestUrl: INGEST_URL, maxRetries: 2, initialRetryDelay: 1, onFailure });

    emitter.emitRequestStart({ source: 'assistants.runs', correlationId: 'corr-4' });
    await emitter.flush();

    expect(bodies).toHaveLength(3);
    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0]?.[0].message).toBe('HTTP 500: Server Error');
    expect(onFailure.mock.calls[0]?.[1]).toMatchObject({ correlationId: 'corr-4', eventType: 'request_start' });
  });

  it('should report client errors', async () => {
    intercept(400, 400, 400);
    const onFailure = vi.fn<[Error, TelemetryEvent], void>();
    const emitter = new TelemetryEmitter({ ingestUrl: INGEST_URL, initialRetryDelay: 1, onFailure });

    emitter.emitRequestStart({ source: 'assistants', correlationId: 'corr-5' });
    await emitter.flush();

    expect(onFailure.mock.calls[0]?.[0].message).toBe('HTTP 400: Client Error');
  });

  it('should resolve flush immediately when idle', async () => {
    const emitter = new TelemetryEmitter({ ingestUrl: INGEST_URL });

    await expect(emitter.flush()).resolves.toBeUndefined();
  });
});
