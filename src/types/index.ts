export type {
  RequestOptions,
  PaginationParams,
  PaginatedResponse,
  Usage,
  ApiError,
  ApiErrorResponse,
  HttpMethod,
  QueryParams,
  HttpRequest,
  HttpResponse,
  StreamChunk,
} from './common.js';
