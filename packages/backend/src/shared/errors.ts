export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed input: an API payload, a CSV row, or a provider record we cannot key. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
  }
}

/** Invalid or missing credentials for a remote provider. Fatal for a job. */
export class AuthError extends AppError {
  constructor(
    public provider: string,
    message: string,
  ) {
    super(401, 'PROVIDER_AUTH_ERROR', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
  }
}

/** Raised only when the budget is configured as strict; otherwise denial is a plain value. */
export class BudgetExhaustedError extends AppError {
  constructor(message: string) {
    super(402, 'BUDGET_EXHAUSTED', message);
  }
}

/**
 * Timeout, network failure, 5xx or throttling from a remote provider.
 * `retryable` is false once the retry policy has given up.
 */
export class TransientProviderError extends AppError {
  constructor(
    public provider: string,
    message: string,
    public retryable = true,
  ) {
    super(503, 'PROVIDER_UNAVAILABLE', message);
  }
}

export class TimeoutError extends AppError {
  constructor(
    public timeoutMs: number,
    message: string,
  ) {
    super(504, 'TIMEOUT', message);
  }
}
