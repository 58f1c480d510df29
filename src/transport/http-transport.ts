import type { HttpRequest, QueryParams, StreamChunk } from '../types/common.js';
import { mapHttpError, mapNetworkError } from '../errors/mapping.js';
import { AssistantsError } from '../errors/error.js';
import { APIError, StreamError, TimeoutError } from '../errors/categories.js';
import { parseSSEStream } from './sse.js';

export type { HttpRequest } from '../types/common.js';

export interface HttpTransport {
  request<T>(request: HttpRequest): Promise<T>;
  stream<T>(request: HttpRequest): AsyncIterable<StreamChunk<T>>;
}

const STREAM_TERMINATOR = '[DONE]';

export class FetchHttpTransport implements HttpTransport {
  constructor(
    private readonly baseUrl: string,
    private readonly defaultHeaders: Record<string, string> = {},
    private readonly defaultTimeout: number = 60000
  ) {}

  async request<T>(request: HttpRequest): Promise<T> {
    const { response, release } = await this.send(request, 'application/json');
    try {
      const data: unknown = await response.json();
      return data as T;
    } catch (error) {
      if (error instanceof AssistantsError) throw error;
      throw mapNetworkError(error);
    } finally {
      release();
    }
  }

  async *stream<T>(request: HttpRequest): AsyncIterable<StreamChunk<T>> {
    const { response, release } = await this.send(request, 'text/event-stream');

    try {
      if (!response.body) {
        throw new APIError('No response body', response.status);
      }

      for await (const message of parseSSEStream(response.body)) {
        if (message.data === STREAM_TERMINATOR) return;
        yield { event: message.event, data: parseEventData<T>(message.data, message.event) };
      }
    } finally {
      release();
    }
  }

  /**
   * The timeout covers the whole exchange for unary calls. Streams only wait
   * on it until the response headers arrive; the caller's signal stays
   * attached until `release` runs.
   */
  private async send(
    request: HttpRequest,
    accept: string
  ): Promise<{ response: Response; release: () => void }> {
    const url = this.buildUrl(request.path, request.query);
    const streaming = accept === 'text/event-stream';
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeout ?? this.defaultTimeout);

    const forwardAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', forwardAbort, { once: true });

    const release = (): void => {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', forwardAbort);
    };

    try {
      const response = await fetch(url, {
        method: request.method,
        headers: {
          'Content-Type': 'application/json',
          'Accept': accept,
          ...this.defaultHeaders,
          ...request.headers,
        },
        body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
        signal: controller.signal,
      });

      if (timedOut) throw new TimeoutError();

      if (!response.ok) {
        const body = await response.text();
        throw mapHttpError(response.status, body, response.headers);
      }

      if (streaming) clearTimeout(timeoutId);
      return { response, release };
    } catch (error) {
      release();
      if (error instanceof AssistantsError) throw error;
      if (timedOut) throw new TimeoutError();
      throw mapNetworkError(error);
    }
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }
}

function parseEventData<T>(raw: string, event?: string): T {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new StreamError(`Malformed event data${event ? ` for ${event}` : ''}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}
