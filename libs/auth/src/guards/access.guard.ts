import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  Type,
  mixin,
} from '@nestjs/common';
import { ExtractJwt } from 'passport-jwt';
import { AuthService } from '../auth.service';
import { AuthError, ForbiddenError, MissingCredentialsError } from '../errors';
import type { AuthUser, AuthenticatedRequest } from '../interfaces';

/**
 * Capabilities a route demands beyond a valid identity.
 */
export interface AccessPolicy {
  requiresAdmin: boolean;
}

export interface AccessGuardInstance extends CanActivate {
  authorize(request: AuthenticatedRequest): Promise<AuthUser>;
}

const fromBearerHeader = ExtractJwt.fromAuthHeaderAsBearerToken();

/**
 * Pull the token out of `Authorization: Bearer <token>`.
 * The scheme is matched case-insensitively; anything else counts as absent.
 */
export function extractBearerToken(
  request: AuthenticatedRequest,
): string | undefined {
  return fromBearerHeader(request) ?? undefined;
}

/**
 * Build a guard class for the given policy.
 *
 * Both services apply the same identity check; the admin service
 * only flips `requiresAdmin`. Guards built here are plain providers,
 * so `AuthService` must be resolvable where they are used (AuthModule
 * is global).
 *
 * Usage:
 * ```ts
 * @UseGuards(AdminGate)
 * @Get('users')
 * list(): Promise<UserProfileDto[]> { ... }
 * ```
 */
export function createAccessGuard(policy: AccessPolicy): Type<AccessGuardInstance> {
  const label = policy.requiresAdmin ? 'AdminGate' : 'AccessGuard';

  @Injectable()
  class MixinAccessGuard implements AccessGuardInstance {
    private readonly logger = new Logger(label);

    constructor(@Inject(AuthService) private readonly authService: AuthService) {}

    async canActivate(context: ExecutionContext): Promise<boolean> {
      const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
      request.user = await this.authorize(request);
      return true;
    }

    async authorize(request: AuthenticatedRequest): Promise<AuthUser> {
      try {
        const token = extractBearerToken(request);
        if (!token) {
          throw new MissingCredentialsError();
        }

        const user = await this.authService.resolve(token, new Date());

        if (policy.requiresAdmin && !user.isAdmin) {
          throw new ForbiddenError();
        }

        return user;
      } catch (error) {
        if (error instanceof AuthError) {
          this.logger.debug(
            `Rejected ${request.method} ${request.originalUrl ?? request.url}: ${error.kind}`,
          );
        }
        throw error;
      }
    }
  }

  return mixin(MixinAccessGuard);
}

/** Any authenticated user */
export const AccessGuard = createAccessGuard({ requiresAdmin: false });

/** Authenticated user with `is_admin` set */
export const AdminGate = createAccessGuard({ requiresAdmin: true });
