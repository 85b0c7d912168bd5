export class HttpError extends Error {
  constructor(
    public readonly http: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request', details?: unknown) {
    super(400, message, details);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = '404 page not found', details?: unknown) {
    super(404, message, details);
  }
}

export class InternalServerError extends HttpError {
  constructor(message = 'Internal Server Error', details?: unknown) {
    super(500, message, details);
  }
}

/** Tag prepended to every failure recovered from a request handler */
export const RECOVERED_TAG = 'http';

const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

/**
 * A failure that escaped a request handler, coerced to an Error and tagged.
 * The original value is kept as `cause`.
 */
export class RecoveredError extends InternalServerError {
  constructor(cause: unknown) {
    const inner = toError(cause);
    super(`${RECOVERED_TAG}: ${inner.message}`);
    this.cause = cause;
    this.stack = inner.stack ?? this.stack;
  }
}
