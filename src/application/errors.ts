/**
 * Application-level errors for HTTP layer mapping.
 * Each carries a stable code and status; the message is safe to show to clients.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCredentialsError extends ApplicationError {
  readonly code = 'INVALID_CREDENTIALS';
  readonly status = 401;

  constructor(message = 'Incorrect email or password') {
    super(message);
  }
}

export class AccountInactiveError extends ApplicationError {
  readonly code = 'ACCOUNT_INACTIVE';
  readonly status = 401;

  constructor(message = 'User account is inactive') {
    super(message);
  }
}

export type UnauthenticatedReason =
  | 'NO_TOKEN'
  | 'MALFORMED'
  | 'BAD_SIGNATURE'
  | 'EXPIRED'
  | 'MISSING_SUBJECT'
  | 'UNKNOWN_SUBJECT';

/**
 * Any failure to establish identity from a bearer token. `reason` is for logs
 * and audit only and must not be sent to the client.
 */
export class UnauthenticatedError extends ApplicationError {
  readonly code = 'UNAUTHENTICATED';
  readonly status = 401;

  constructor(
    readonly reason: UnauthenticatedReason,
    message = 'Could not validate credentials'
  ) {
    super(message);
  }
}

export class ForbiddenError extends ApplicationError {
  readonly code = 'FORBIDDEN';
  readonly status = 403;

  constructor(message = 'Admin privileges required') {
    super(message);
  }
}

export class NotFoundError extends ApplicationError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;

  constructor(message = 'Resource not found') {
    super(message);
  }
}

export class ConflictError extends ApplicationError {
  readonly code = 'CONFLICT';
  readonly status = 409;

  constructor(message = 'Conflict') {
    super(message);
  }
}

export class RateLimitedError extends ApplicationError {
  readonly code = 'RATE_LIMITED';
  readonly status = 429;

  constructor(message = 'Too many requests, please try again later.') {
    super(message);
  }
}
