import type { Request } from 'express';
import type { AuthUser } from './auth-user.interface';

/**
 * Express request as seen by guards and the `@CurrentUser()` decorator.
 * `user` is only set once the access guard has authorized the call.
 */
export interface AuthenticatedRequest extends Request {
  user?: AuthUser;
}
