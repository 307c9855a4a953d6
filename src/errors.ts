/**
 * Error taxonomy for the catalog service.
 *
 * Every failure a caller can observe is one of these kinds; the HTTP error
 * middleware turns `statusCode` + `code` into the response and never echoes
 * `details` (which may carry SQLite text) back to the client.
 */

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: ErrorDetails;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = "INTERNAL_ERROR",
    isOperational: boolean = true,
    details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} ${id} not found` : `${resource} not found`;
    super(message, 404, `${resource.toUpperCase()}_NOT_FOUND`, true, id ? { id } : undefined);
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 400, "INVALID_ARGUMENT", true, details);
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string, path: string) {
    super(`Method ${method} not allowed on ${path}`, 405, "METHOD_NOT_ALLOWED", true, { method, path });
  }
}

export class StoreUnavailableError extends AppError {
  constructor(details?: ErrorDetails) {
    super("Catalog store unavailable", 503, "STORE_UNAVAILABLE", true, details);
  }
}

/**
 * A single store read failed. `malformedInput` marks failures caused by the
 * filter the caller passed (unknown key, wrong value type); the query service
 * reports those as InvalidArgument. Everything else is a store fault (500).
 */
export class QueryError extends AppError {
  public readonly malformedInput: boolean;

  constructor(operation: string, options: { malformedInput?: boolean; cause?: unknown; details?: ErrorDetails } = {}) {
    super("Catalog query failed", 500, "QUERY_FAILED", false, {
      operation,
      ...options.details,
      ...(options.cause !== undefined && { cause: describeError(options.cause) }),
    });
    this.malformedInput = options.malformedInput ?? false;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
