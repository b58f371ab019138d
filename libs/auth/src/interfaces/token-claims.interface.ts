/**
 * Raw JWT payload. Only registered claims are used: the username
 * travels in `sub`.
 */
export interface JwtPayload {
  sub: string;
  iat: number;
  exp: number;
}

/** Decoded, verified claims with timestamps as dates */
export interface TokenClaims {
  subject: string;
  issuedAt: Date;
  expiresAt: Date;
}
