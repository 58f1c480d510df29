import { AssistantsError } from './error.js';

/**
 * Raised synchronously while building a request, before anything is sent.
 */
export class InvalidArgumentError extends AssistantsError {
  constructor(message: string, options?: { param?: string }) {
    super(message, options);
  }
}

export class ConfigurationError extends AssistantsError {
  constructor(message: string, options?: { param?: string }) {
    super(message, options);
  }
}

/** The server closed or broke a run event stream. Never retried: events may already be consumed. */
export class StreamError extends AssistantsError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
  }
}

export class AuthenticationError extends AssistantsError {
  constructor(message: string, options?: { code?: string; requestId?: string }) {
    super(message, { statusCode: 401, ...options });
  }
}

export class RateLimitError extends AssistantsError {
  /** Seconds, from the `retry-after` header. */
  readonly retryAfter?: number;

  constructor(message: string, options?: { retryAfter?: number; requestId?: string }) {
    super(message, { statusCode: 429, requestId: options?.requestId });
    this.retryAfter = options?.retryAfter;
  }

  override get retryable(): boolean {
    return true;
  }
}

export class InvalidRequestError extends AssistantsError {
  constructor(message: string, options?: { param?: string; code?: string; requestId?: string }) {
    super(message, { statusCode: 400, ...options });
  }
}

export class NotFoundError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super(message, { statusCode: 404, ...options });
  }
}

export class PermissionDeniedError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super(message, { statusCode: 403, ...options });
  }
}

/** Usually a run already active on the thread. */
export class ConflictError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super(message, { statusCode: 409, ...options });
  }
}

export class UnprocessableEntityError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super(message, { statusCode: 422, ...options });
  }
}

/** Any other status. Server-side ones are worth another try. */
export class APIError extends AssistantsError {
  declare readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { type?: string; code?: string; requestId?: string }) {
    super(message, { statusCode, ...options });
  }

  override get retryable(): boolean {
    return this.statusCode >= 500;
  }
}

export class APIConnectionError extends AssistantsError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
  }

  override get retryable(): boolean {
    return true;
  }
}

export class TimeoutError extends AssistantsError {
  constructor(message: string = 'Request timed out') {
    super(message);
  }

  override get retryable(): boolean {
    return true;
  }
}

export class InternalServerError extends AssistantsError {
  constructor(message: string, options?: { requestId?: string }) {
    super(message, { statusCode: 500, ...options });
  }

  override get retryable(): boolean {
    return true;
  }
}
