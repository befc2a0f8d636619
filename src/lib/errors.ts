export type ErrorDetails = Record<string, unknown>;

export interface ErrorBody {
  code: string;
  message: string;
  details?: ErrorDetails;
}

/**
 * Base class for every error the server raises on purpose. Carries the HTTP
 * status the request layer answers with and a stable machine-readable code.
 */
export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details: ErrorDetails;

  constructor(
    message: string,
    opts: { code?: string; statusCode?: number; details?: ErrorDetails; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "AppError";
    this.code = opts.code ?? "INTERNAL_ERROR";
    this.statusCode = opts.statusCode ?? 500;
    this.details = opts.details ?? {};
  }

  toJSON(): ErrorBody {
    const body: ErrorBody = { code: this.code, message: this.message };
    if (Object.keys(this.details).length > 0) {
      body.details = this.details;
    }
    return body;
  }
}

type ErrorInit = { details?: ErrorDetails; cause?: unknown };

export class ValidationError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "VALIDATION_ERROR", statusCode: 400 });
    this.name = "ValidationError";
  }
}

/** Missing or rejected credentials, including a failed token exchange. */
export class AuthError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "AUTHENTICATION_ERROR", statusCode: 401 });
    this.name = "AuthError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "NOT_FOUND", statusCode: 404 });
    this.name = "NotFoundError";
  }
}

/** Missing or invalid settings. Fatal when raised at start-up. */
export class ConfigurationError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "CONFIGURATION_ERROR", statusCode: 500 });
    this.name = "ConfigurationError";
  }
}

export class ConversionError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "CONVERSION_ERROR", statusCode: 500 });
    this.name = "ConversionError";
  }
}

export class EscapeError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "ESCAPE_ERROR", statusCode: 400 });
    this.name = "EscapeError";
  }
}

/** Remote execution failure. The message is the remote one, verbatim. */
export class QueryError extends AppError {
  constructor(
    message: string,
    init: ErrorInit & { code?: string; statusCode?: number } = {},
  ) {
    super(message, {
      ...init,
      code: init.code ?? "QUERY_ERROR",
      statusCode: init.statusCode ?? 502,
    });
    this.name = "QueryError";
  }
}

/** Transport-level failure that survived the reconnect retry. */
export class ConnectionError extends QueryError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "CONNECTION_ERROR", statusCode: 503 });
    this.name = "ConnectionError";
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "TIMEOUT", statusCode: 504 });
    this.name = "TimeoutError";
  }
}

export class QueueSaturatedError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "SERVICE_UNAVAILABLE", statusCode: 503 });
    this.name = "QueueSaturatedError";
  }
}

export class ExternalServiceError extends AppError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "EXTERNAL_SERVICE_ERROR", statusCode: 502 });
    this.name = "ExternalServiceError";
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Translate anything thrown below the request layer into a status and body.
 * Unknown errors keep their message outside production only.
 */
export function toErrorResponse(
  error: unknown,
  opts: { exposeInternal?: boolean } = {},
): { status: number; body: ErrorBody } {
  if (error instanceof AppError) {
    return { status: error.statusCode, body: error.toJSON() };
  }
  if (isAbortError(error)) {
    return { status: 499, body: { code: "CLIENT_CLOSED_REQUEST", message: "Request aborted" } };
  }
  return {
    status: 500,
    body: {
      code: "INTERNAL_ERROR",
      message: opts.exposeInternal ? errorMessage(error) : "Internal server error",
    },
  };
}
