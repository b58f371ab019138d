import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { MissingCredentialsError } from '../errors';
import type { AuthUser, AuthenticatedRequest } from '../interfaces';

/**
 * Parameter decorator that extracts the authorized user from the request.
 *
 * Usage:
 * ```ts
 * @Get('me')
 * @UseGuards(AccessGuard)
 * me(@CurrentUser() user: AuthUser): UserProfileDto {
 *   return UserProfileDto.fromUser(user);
 * }
 * ```
 *
 * Without a guard in front there is no user; the call is rejected
 * rather than handed `undefined`.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthUser => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new MissingCredentialsError();
    }
    return request.user;
  },
);
