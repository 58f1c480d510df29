import { z } from 'zod';
import type { ApiError } from '../types/common.js';
import type { AssistantsError } from './error.js';
import {
  AuthenticationError,
  RateLimitError,
  InvalidRequestError,
  NotFoundError,
  PermissionDeniedError,
  ConflictError,
  UnprocessableEntityError,
  APIError,
  APIConnectionError,
  InternalServerError,
} from './categories.js';

const apiErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().default('unknown'),
    param: z.string().nullish(),
    code: z.string().nullish(),
  }),
});

export function mapHttpError(
  status: number,
  body: string,
  headers: Headers
): AssistantsError {
  const requestId = headers.get('x-request-id') ?? undefined;
  const retryAfter = parseRetryAfter(headers.get('retry-after'));

  const apiError = parseApiError(body);
  const message = apiError?.message ?? `HTTP ${status} error`;
  const code = apiError?.code ?? undefined;
  const param = apiError?.param ?? undefined;
  const type = apiError?.type;

  switch (status) {
    case 400: return new InvalidRequestError(message, { param, code, requestId });
    case 401: return new AuthenticationError(message, { code, requestId });
    case 403: return new PermissionDeniedError(message, { requestId });
    case 404: return new NotFoundError(message, { requestId });
    case 409: return new ConflictError(message, { requestId });
    case 422: return new UnprocessableEntityError(message, { requestId });
    case 429: return new RateLimitError(message, { retryAfter, requestId });
    case 500: return new InternalServerError(message, { requestId });
    default: return new APIError(message, status, { type, code, requestId });
  }
}

export function mapNetworkError(error: unknown): APIConnectionError {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new APIConnectionError(`Network error: ${cause.message}`, { cause });
}

function parseApiError(body: string): ApiError | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = apiErrorResponseSchema.safeParse(json);
  return result.success ? result.data.error : undefined;
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = parseInt(value, 10);
  return isNaN(seconds) ? undefined : seconds;
}
