export interface RequestOptions {
  timeout?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface PaginationParams {
  limit?: number;
  after?: string;
  before?: string;
  order?: 'asc' | 'desc';
}

export interface PaginatedResponse<T> {
  data: T[];
  object: 'list';
  first_id?: string;
  last_id?: string;
  has_more: boolean;
}

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ApiError {
  message: string;
  type: string;
  param?: string | null;
  code?: string | null;
}

export interface ApiErrorResponse {
  error: ApiError;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  body?: unknown;
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpResponse<T = unknown> {
  status: number;
  headers: Record<string, string>;
  data: T;
}

/**
 * One server-sent event. `event` is absent when the server only sends
 * `data:` lines.
 */
export interface StreamChunk<T> {
  data: T;
  event?: string;
}
