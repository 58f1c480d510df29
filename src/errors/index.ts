export { AssistantsError, isAssistantsError, type AssistantsErrorDetails } from './error.js';
export {
  InvalidArgumentError,
  ConfigurationError,
  StreamError,
  AuthenticationError,
  RateLimitError,
  InvalidRequestError,
  APIError,
  APIConnectionError,
  TimeoutError,
  ConflictError,
  NotFoundError,
  UnprocessableEntityError,
  PermissionDeniedError,
  InternalServerError,
} from './categories.js';
export { mapHttpError, mapNetworkError } from './mapping.js';
