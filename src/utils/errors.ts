/**
 * Typed failures that reach the HTTP boundary. Each carries the status the
 * route layer answers with; none of them is retried automatically.
 */
export class AppError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
  }
}

/** Input breaks a write-time invariant, e.g. a grade outside 1..5 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

/** Missing bearer token, or one that does not resolve to a user */
export class AuthenticationError extends AppError {
  constructor(message = 'Not authorized, no token') {
    super(message, 401);
    this.name = 'AuthenticationError';
  }
}

/** The actor lacks the capability the operation needs */
export class AuthorizationError extends AppError {
  constructor(message: string) {
    super(message, 403);
    this.name = 'AuthorizationError';
  }
}

/** Missing or inactive product; missing or already retracted review */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/** A write-then-aggregate transaction failed and was rolled back */
export class TransactionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
    this.name = 'TransactionError';
  }
}
