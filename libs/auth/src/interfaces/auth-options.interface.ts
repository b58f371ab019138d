/**
 * Immutable settings shared by the password hasher and token codec.
 * Built once from configuration and frozen.
 */
export interface AuthOptions {
  /** HMAC key for HS256 signatures. Rotating it invalidates every issued token. */
  readonly secret: string;

  /** Lifetime of an access token, in seconds */
  readonly tokenTtlSeconds: number;

  /** bcrypt cost factor */
  readonly bcryptRounds: number;
}
