import { Inject, Injectable, Logger } from '@nestjs/common';
import { USER_STORE } from './auth.constants';
import { InvalidCredentialsError, UserNotFoundError } from './errors';
import type { AuthUser, StoredUser, UserStore } from './interfaces';
import { PasswordHasher } from './password';
import { TokenCodec } from './token';

/**
 * AuthService — login and token-to-identity resolution.
 *
 * Security considerations:
 * - login() always performs exactly one bcrypt comparison. Unknown
 *   usernames are compared against a precomputed dummy hash so timing
 *   does not reveal whether an account exists.
 * - Unknown username and wrong password raise the same error.
 * - resolve() re-reads the account on every call: tokens are stateless,
 *   so a deleted account is only noticed here.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(USER_STORE) private readonly userStore: UserStore,
    private readonly passwordHasher: PasswordHasher,
    private readonly tokenCodec: TokenCodec,
  ) {}

  get tokenTtlSeconds(): number {
    return this.tokenCodec.ttlSeconds;
  }

  /**
   * Verify credentials and issue an access token.
   *
   * @throws InvalidCredentialsError if the username is unknown or the password is wrong
   * @throws StoreUnavailableError if the credential store cannot be reached
   */
  async login(
    username: string,
    password: string,
    now: Date = new Date(),
  ): Promise<string> {
    const user = await this.userStore.findByUsername(username);

    const passwordMatches = user
      ? await this.passwordHasher.verify(password, user.passwordHash)
      : await this.passwordHasher.verifyAgainstDummy(password);

    if (!user || !passwordMatches) {
      throw new InvalidCredentialsError();
    }

    this.logger.log(`User logged in: ${user.id} (${user.username})`);

    return this.tokenCodec.issue(user.username, now);
  }

  /**
   * Resolve a bearer token to the account it names.
   *
   * Token errors propagate unchanged.
   *
   * @throws UserNotFoundError if the account was deleted after issuance
   */
  async resolve(token: string, now: Date = new Date()): Promise<AuthUser> {
    const claims = this.tokenCodec.verify(token, now);

    const user = await this.userStore.findByUsername(claims.subject);
    if (!user) {
      throw new UserNotFoundError(claims.subject);
    }

    return toAuthUser(user);
  }
}

export function toAuthUser(user: StoredUser): AuthUser {
  return {
    id: user.id,
    username: user.username,
    isAdmin: user.isAdmin,
  };
}
