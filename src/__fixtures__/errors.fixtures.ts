import type { ApiErrorResponse, HttpResponse } from '../types/common.js';

export function createApiError(
  message: string,
  type: string,
  code?: string | null,
  param?: string | null
): ApiErrorResponse {
  return {
    error: {
      message,
      type,
      code: code ?? null,
      param: param ?? null,
    },
  };
}

export function create400InvalidRequestError(param = 'assistant_id'): HttpResponse<ApiErrorResponse> {
  return {
    status: 400,
    headers: { 'content-type': 'application/json' },
    data: createApiError(`Invalid value for '${param}'.`, 'invalid_request_error', null, param),
  };
}

export function create401UnauthorizedError(): HttpResponse<ApiErrorResponse> {
  return {
    status: 401,
    headers: { 'content-type': 'application/json' },
    data: createApiError('Incorrect API key provided.', 'invalid_request_error', 'invalid_api_key'),
  };
}

export function create404NotFoundError(resource = 'run'): HttpResponse<ApiErrorResponse> {
  return {
    status: 404,
    headers: { 'content-type': 'application/json' },
    data: createApiError(`No ${resource} found.`, 'invalid_request_error'),
  };
}

export function create429RateLimitError(retryAfter = '1'): HttpResponse<ApiErrorResponse> {
  return {
    status: 429,
    headers: { 'content-type': 'application/json', 'retry-after': retryAfter },
    data: createApiError('Rate limit reached for requests.', 'requests', 'rate_limit_exceeded'),
  };
}

export function create500InternalServerError(): HttpResponse<ApiErrorResponse> {
  return {
    status: 500,
    headers: { 'content-type': 'application/json' },
    data: createApiError('The server had an error while processing your request.', 'server_error'),
  };
}
