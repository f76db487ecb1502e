export class ReelfetchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
    public readonly raw?: unknown,
  ) {
    super(message);
    this.name = 'ReelfetchError';
    Object.setPrototypeOf(this, ReelfetchError.prototype);
  }
}

export class AuthenticationError extends ReelfetchError {
  constructor(message = 'Invalid or missing API key', raw?: unknown) {
    super(message, 'UNAUTHORIZED', 401, undefined, raw);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class InvalidRequestError extends ReelfetchError {
  constructor(message: string, code = 'VALIDATION_ERROR', details?: Record<string, unknown>, raw?: unknown) {
    super(message, code, 400, details, raw);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class NotFoundError extends ReelfetchError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND', raw?: unknown) {
    super(message, code, 404, undefined, raw);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class QueueSaturatedError extends ReelfetchError {
  constructor(message = 'Job queue is full', public readonly retryAfterSeconds?: number, raw?: unknown) {
    super(
      message,
      'QUEUE_SATURATED',
      503,
      retryAfterSeconds !== undefined ? { retry_after_seconds: retryAfterSeconds } : undefined,
      raw,
    );
    this.name = 'QueueSaturatedError';
    Object.setPrototypeOf(this, QueueSaturatedError.prototype);
  }
}
