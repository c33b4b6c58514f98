import type { PasswordRule } from './passwordPolicy.js';

export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type AuthErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'ACCOUNT_INACTIVE'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_REVOKED'
  | 'TOKEN_MALFORMED'
  | 'WRONG_TOKEN_TYPE'
  | 'INVALID_API_KEY'
  | 'USER_NOT_FOUND'
  | 'USER_INACTIVE';

/**
 * Authentication failure with a specific kind. The kind is for logs and
 * internal callers; the HTTP boundary collapses these to a generic 401.
 */
export abstract class AuthError extends DomainError {
  abstract readonly code: AuthErrorCode;
}

export class InvalidCredentialsError extends AuthError {
  readonly code = 'INVALID_CREDENTIALS';

  constructor(message = 'Invalid username or password') {
    super(message);
  }
}

export class AccountInactiveError extends AuthError {
  readonly code = 'ACCOUNT_INACTIVE';

  constructor(message = 'Account is deactivated') {
    super(message);
  }
}

export class TokenExpiredError extends AuthError {
  readonly code = 'TOKEN_EXPIRED';

  constructor(message = 'Token has expired') {
    super(message);
  }
}

export class TokenRevokedError extends AuthError {
  readonly code = 'TOKEN_REVOKED';

  constructor(message = 'Token has been revoked') {
    super(message);
  }
}

export class TokenMalformedError extends AuthError {
  readonly code = 'TOKEN_MALFORMED';

  constructor(message = 'Token is malformed or its signature is invalid') {
    super(message);
  }
}

export class WrongTokenTypeError extends AuthError {
  readonly code = 'WRONG_TOKEN_TYPE';

  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Expected a ${expected} token, got ${actual}`);
  }
}

export class InvalidApiKeyError extends AuthError {
  readonly code = 'INVALID_API_KEY';

  constructor(message = 'Invalid API key') {
    super(message);
  }
}

export class UserNotFoundError extends AuthError {
  readonly code = 'USER_NOT_FOUND';

  constructor(message = 'User not found') {
    super(message);
  }
}

export class UserInactiveError extends AuthError {
  readonly code = 'USER_INACTIVE';

  constructor(message = 'User is deactivated') {
    super(message);
  }
}

export class WeakPasswordError extends DomainError {
  constructor(
    readonly rule: PasswordRule,
    readonly reason: string
  ) {
    super(reason);
  }
}

export type ConflictField = 'username' | 'email';

export class RegistrationConflictError extends DomainError {
  constructor(readonly field: ConflictField) {
    super(field === 'username' ? 'Username is already taken' : 'Email is already registered');
  }

  get code(): 'USERNAME_TAKEN' | 'EMAIL_TAKEN' {
    return this.field === 'username' ? 'USERNAME_TAKEN' : 'EMAIL_TAKEN';
  }
}

export class InvalidEmailError extends DomainError {
  constructor(message = 'Invalid email format') {
    super(message);
  }
}
