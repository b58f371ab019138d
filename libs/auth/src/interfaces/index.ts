export type { AuthOptions } from './auth-options.interface';
export type { AuthUser } from './auth-user.interface';
export type { AuthenticatedRequest } from './authenticated-request.interface';
export type { JwtPayload, TokenClaims } from './token-claims.interface';
export type { NewUser, StoredUser, UserStore } from './user-store.interface';
