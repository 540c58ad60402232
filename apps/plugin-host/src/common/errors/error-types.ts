export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /** Value placed in the `detail` field of the error envelope. */
  toEnvelopeDetail(): string | unknown[] {
    return this.message;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, details?: Record<string, unknown>) {
    super(
      `${resource}${identifier ? ` with identifier ${identifier}` : ''} not found`,
      'not_found',
      404,
      details,
    );
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'bad_request', 400, details);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'validation_error', 400, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'conflict', 409, details);
  }
}

export class IOError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'io_error', 500, details);
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'timeout', 408, details);
  }
}

/**
 * Catch-all for failures whose cause must not reach the caller.
 * The cause is kept for operator logs only.
 */
export class InternalError extends AppError {
  constructor(
    public readonly cause?: unknown,
    details?: Record<string, unknown>,
    code = 'internal_error',
  ) {
    super('An unexpected error occurred', code, 500, details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
