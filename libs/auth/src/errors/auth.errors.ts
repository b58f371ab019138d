/**
 * Error taxonomy of the auth core.
 *
 * Every failure the core can report is an `AuthError` with a `kind`.
 * Kinds are internal: `AuthExceptionFilter` collapses them into a coarse
 * HTTP response so clients never learn whether a username exists or
 * which part of a token failed.
 */
export type AuthErrorKind =
  | 'InvalidCredentials'
  | 'TokenMalformed'
  | 'SignatureInvalid'
  | 'TokenExpired'
  | 'UserNotFound'
  | 'MissingCredentials'
  | 'Forbidden'
  | 'StoreUnavailable'
  | 'HashingError';

export abstract class AuthError extends Error {
  abstract readonly kind: AuthErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Only store outages are worth retrying; everything else needs new credentials */
  get retryable(): boolean {
    return this.kind === 'StoreUnavailable';
  }
}

/** Unknown username or wrong password. Deliberately one kind. */
export class InvalidCredentialsError extends AuthError {
  readonly kind = 'InvalidCredentials';

  constructor() {
    super('Invalid username or password');
  }
}

export class TokenMalformedError extends AuthError {
  readonly kind = 'TokenMalformed';

  constructor(detail = 'Token is not a well-formed JWT') {
    super(detail);
  }
}

/** Tampered token or a token signed with another key */
export class SignatureInvalidError extends AuthError {
  readonly kind = 'SignatureInvalid';

  constructor() {
    super('Token signature does not match');
  }
}

export class TokenExpiredError extends AuthError {
  readonly kind = 'TokenExpired';

  constructor(readonly expiredAt?: Date) {
    super('Token has expired');
  }
}

/** Valid token whose account has since been deleted */
export class UserNotFoundError extends AuthError {
  readonly kind = 'UserNotFound';

  constructor(readonly subject: string) {
    super('Token subject no longer exists');
  }
}

export class MissingCredentialsError extends AuthError {
  readonly kind = 'MissingCredentials';

  constructor() {
    super('No bearer token presented');
  }
}

export class ForbiddenError extends AuthError {
  readonly kind = 'Forbidden';

  constructor() {
    super('Admin privileges required');
  }
}

export class StoreUnavailableError extends AuthError {
  readonly kind = 'StoreUnavailable';

  constructor(cause?: unknown) {
    super('Credential store is unavailable', { cause });
  }
}

export class HashingError extends AuthError {
  readonly kind = 'HashingError';

  constructor(cause?: unknown) {
    super('Password hashing failed', { cause });
  }
}

/**
 * Raised by a `UserStore` when the unique username index rejects a write.
 * Not an `AuthError`: registration turns it into a 409.
 */
export class DuplicateUsernameError extends Error {
  constructor(readonly username: string, options?: { cause?: unknown }) {
    super(`Username "${username}" is already taken`, options);
    this.name = 'DuplicateUsernameError';
  }
}

/**
 * Raised by `PasswordHasher.hash` for input bcrypt would truncate.
 * DTO validation rejects such passwords first; reaching this is a bug
 * in the caller.
 */
export class PasswordTooLongError extends Error {
  constructor(readonly byteLength: number, readonly maxBytes: number) {
    super(`Password is ${byteLength} bytes; at most ${maxBytes} are allowed`);
    this.name = 'PasswordTooLongError';
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}
