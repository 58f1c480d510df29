export interface AssistantsErrorDetails {
  statusCode?: number;
  /** Machine-readable code from the API error body, e.g. `invalid_value`. */
  code?: string;
  /** The request field the failure points at, in wire spelling. */
  param?: string;
  type?: string;
  /** `x-request-id` of the failed call, for support tickets. */
  requestId?: string;
  cause?: unknown;
}

/**
 * Base of every error the client throws. Subclasses say whether sending the
 * same request again may succeed.
 */
export abstract class AssistantsError extends Error {
  readonly statusCode?: number;
  readonly code?: string;
  readonly param?: string;
  readonly type?: string;
  readonly requestId?: string;

  constructor(message: string, details: AssistantsErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.statusCode = details.statusCode;
    this.code = details.code;
    this.param = details.param;
    this.type = details.type;
    this.requestId = details.requestId;
  }

  get retryable(): boolean {
    return false;
  }

  /** Log-friendly view; unset fields are left out. */
  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = { name: this.name, message: this.message, retryable: this.retryable };
    if (this.statusCode !== undefined) json.statusCode = this.statusCode;
    if (this.code !== undefined) json.code = this.code;
    if (this.param !== undefined) json.param = this.param;
    if (this.type !== undefined) json.type = this.type;
    if (this.requestId !== undefined) json.requestId = this.requestId;
    return json;
  }
}

export function isAssistantsError(value: unknown): value is AssistantsError {
  return value instanceof AssistantsError;
}
