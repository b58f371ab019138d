import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { AUTH_OPTIONS } from '../auth.constants';
import {
  SignatureInvalidError,
  TokenExpiredError,
  TokenMalformedError,
} from '../errors';
import type { AuthOptions, JwtPayload, TokenClaims } from '../interfaces';

const ALGORITHM = 'HS256';

/**
 * TokenCodec — issues and verifies HS256 access tokens.
 *
 * The signing key arrives with the frozen `AuthOptions` and is bound to
 * a private `JwtService`, so two codecs with different secrets can live
 * side by side (the public API and admin service each build one from
 * the same configuration).
 *
 * Verification needs no I/O. Failure kinds:
 * - TokenMalformed: not three base64url JSON segments, or claims missing
 * - SignatureInvalid: tampered, wrong key, or unexpected algorithm
 * - TokenExpired: `now >= exp`, only reported once the signature checks out
 */
@Injectable()
export class TokenCodec {
  private readonly jwtService: JwtService;

  constructor(@Inject(AUTH_OPTIONS) private readonly options: AuthOptions) {
    this.jwtService = new JwtService({
      secret: options.secret,
      signOptions: { algorithm: ALGORITHM },
      verifyOptions: { algorithms: [ALGORITHM] },
    });
  }

  get ttlSeconds(): number {
    return this.options.tokenTtlSeconds;
  }

  issue(subject: string, now: Date): string {
    const issuedAt = toUnixSeconds(now);
    const payload: JwtPayload = {
      sub: subject,
      iat: issuedAt,
      exp: issuedAt + this.options.tokenTtlSeconds,
    };

    return this.jwtService.sign(payload);
  }

  verify(token: string, now: Date): TokenClaims {
    this.assertWellFormed(token);

    let payload: Record<string, unknown>;
    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        clockTimestamp: toUnixSeconds(now),
      });
    } catch (error) {
      throw translateVerifyError(error);
    }

    return toClaims(payload);
  }

  /**
   * Three non-empty segments whose header and payload decode to JSON
   * objects. Signature and claims are checked afterwards.
   */
  private assertWellFormed(token: string): void {
    const segments = token.split('.');
    if (segments.length !== 3 || segments.some((segment) => segment.length === 0)) {
      throw new TokenMalformedError();
    }

    let decoded: unknown;
    try {
      decoded = this.jwtService.decode<unknown>(token, { complete: true });
    } catch (error) {
      // jws parses a `typ: JWT` payload eagerly and throws on bad JSON
      throw new TokenMalformedError(
        error instanceof Error ? error.message : undefined,
      );
    }

    if (
      !isRecord(decoded) ||
      !isRecord(decoded.header) ||
      !isRecord(decoded.payload)
    ) {
      throw new TokenMalformedError();
    }
  }
}

function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * jsonwebtoken reports everything through two error names. Structure was
 * already checked, so whatever is not an expiry is a signature problem.
 */
function translateVerifyError(error: unknown): Error {
  if (!(error instanceof Error)) {
    return new SignatureInvalidError();
  }

  if (error.name === 'TokenExpiredError') {
    const expiredAt =
      'expiredAt' in error && error.expiredAt instanceof Date
        ? error.expiredAt
        : undefined;
    return new TokenExpiredError(expiredAt);
  }

  if (error.name === 'JsonWebTokenError' || error.name === 'NotBeforeError') {
    return new SignatureInvalidError();
  }

  return error;
}

function toClaims(payload: Record<string, unknown>): TokenClaims {
  const { sub, iat, exp } = payload;

  if (typeof sub !== 'string' || sub.length === 0) {
    throw new TokenMalformedError('Token has no subject');
  }

  if (typeof iat !== 'number' || typeof exp !== 'number' || exp <= iat) {
    throw new TokenMalformedError('Token has invalid timestamps');
  }

  return {
    subject: sub,
    issuedAt: new Date(iat * 1000),
    expiresAt: new Date(exp * 1000),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
