import { describe, it, expect } from 'vitest';
import { RequestBuilder } from '../request-builder.js';

describe('RequestBuilder', () => {
  it('should build a GET with no extras by default', () => {
    expect(RequestBuilder.create().setPath('v1', 'threads').build()).toEqual({
      method: 'GET',
      path: '/v1/threads',
      query: undefined,
      headers: {},
      body: undefined,
      timeout: undefined,
      signal: undefined,
    });
  });

  it('should encode each path segment', () => {
    const request = RequestBuilder.create().setPath('v1', 'threads', 'a b/c', 'runs').build();

    expect(request.path).toBe('/v1/threads/a%20b%2Fc/runs');
  });

  it('should drop undefined query values', () => {
    expect(RequestBuilder.create().setQuery({ limit: 10, after: undefined }).build().query).toEqual({ limit: 10 });
    expect(RequestBuilder.create().setQuery({ after: undefined }).build().query).toBeUndefined();
  });

  it('should merge headers with per-call options last', () => {
    const controller = new AbortController();
    const request = RequestBuilder.create()
      .setMethod('POST')
      .setHeaders({ 'OpenAI-Beta': 'assistants=v2', 'X-Trace': 'default' })
      .setOptions({ headers: { 'X-Trace': 'trace-1' }, timeout: 0, signal: controller.signal })
      .setBody({ assistant_id: 'asst_1' })
      .build();

    expect(request).toEqual({
      method: 'POST',
      path: '',
      query: undefined,
      headers: { 'OpenAI-Beta': 'assistants=v2', 'X-Trace': 'trace-1' },
      body: { assistant_id: 'asst_1' },
      timeout: 0,
      signal: controller.signal,
    });
  });
});
