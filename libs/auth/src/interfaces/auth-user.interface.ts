/**
 * Identity resolved from a bearer token. Attached to `request.user`
 * by the access guard.
 */
export interface AuthUser {
  id: number;
  username: string;
  isAdmin: boolean;
}
