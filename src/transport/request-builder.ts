import type { HttpRequest, HttpMethod, QueryParams, RequestOptions } from '../types/common.js';

export class RequestBuilder {
  private method: HttpMethod = 'GET';
  private path = '';
  private query?: QueryParams;
  private headers: Record<string, string> = {};
  private body?: unknown;
  private timeout?: number;
  private signal?: AbortSignal;

  setMethod(method: HttpMethod): this {
    this.method = method;
    return this;
  }

  /**
   * Joins the segments with `/`, URI-encoding each one. Plain strings such as
   * `'threads'` pass through unchanged.
   */
  setPath(...segments: string[]): this {
    this.path = '/' + segments.map(encodeURIComponent).join('/');
    return this;
  }

  setQuery(query: QueryParams | undefined): this {
    if (!query) return this;
    const defined = Object.entries(query).filter(([, value]) => value !== undefined);
    this.query = defined.length > 0 ? Object.fromEntries(defined) : undefined;
    return this;
  }

  setHeaders(headers: Record<string, string>): this {
    this.headers = { ...this.headers, ...headers };
    return this;
  }

  setBody(body: unknown): this {
    this.body = body;
    return this;
  }

  setOptions(options?: RequestOptions): this {
    if (options?.headers) {
      this.setHeaders(options.headers);
    }
    if (options?.signal) {
      this.signal = options.signal;
    }
    if (options?.timeout !== undefined) {
      this.timeout = options.timeout;
    }
    return this;
  }

  build(): HttpRequest {
    return {
      method: this.method,
      path: this.path,
      query: this.query,
      headers: this.headers,
      body: this.body,
      timeout: this.timeout,
      signal: this.signal,
    };
  }

  static create(): RequestBuilder {
    return new RequestBuilder();
  }
}
