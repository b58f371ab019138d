import { Inject, Injectable, Logger } from '@nestjs/common';
import { USER_STORE } from '../auth.constants';
import { DuplicateUsernameError, InvalidCredentialsError } from '../errors';
import type { StoredUser, UserStore } from '../interfaces';
import { PasswordHasher } from '../password';
import {
  AccountNotFoundException,
  UsernameTakenException,
} from './accounts.exceptions';

export interface RegisterOptions {
  isAdmin?: boolean;
}

/**
 * AccountsService — account lifecycle on top of the credential store.
 *
 * Responsibilities:
 * - Registration (public: always non-admin; admin service: either)
 * - Password change by the owner, password reset by an admin
 * - Role changes and deletion by an admin
 * - The initial admin account created at startup
 *
 * Access control is not checked here; callers sit behind the
 * access guard or admin gate.
 */
@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);

  constructor(
    @Inject(USER_STORE) private readonly userStore: UserStore,
    private readonly passwordHasher: PasswordHasher,
  ) {}

  /**
   * @throws UsernameTakenException if the username already exists
   */
  async register(
    username: string,
    password: string,
    options: RegisterOptions = {},
  ): Promise<StoredUser> {
    const existing = await this.userStore.findByUsername(username);
    if (existing) {
      throw new UsernameTakenException(username);
    }

    const passwordHash = await this.passwordHasher.hash(password);

    try {
      const user = await this.userStore.create({
        username,
        passwordHash,
        isAdmin: options.isAdmin ?? false,
      });

      this.logger.log(
        `User registered: ${user.id} (${user.username})${user.isAdmin ? ' as admin' : ''}`,
      );
      return user;
    } catch (error) {
      // Lost a race with a concurrent registration
      if (error instanceof DuplicateUsernameError) {
        throw new UsernameTakenException(username);
      }
      throw error;
    }
  }

  /**
   * @throws InvalidCredentialsError if `currentPassword` is wrong
   * @throws AccountNotFoundException if the account vanished meanwhile
   */
  async changePassword(
    userId: number,
    currentPassword: string,
    newPassword: string,
  ): Promise<void> {
    const user = await this.get(userId);

    const matches = await this.passwordHasher.verify(
      currentPassword,
      user.passwordHash,
    );
    if (!matches) {
      throw new InvalidCredentialsError();
    }

    await this.resetPassword(userId, newPassword);
  }

  list(): Promise<StoredUser[]> {
    return this.userStore.findAll();
  }

  /**
   * @throws AccountNotFoundException
   */
  async get(userId: number): Promise<StoredUser> {
    const user = await this.userStore.findById(userId);
    if (!user) {
      throw new AccountNotFoundException(userId);
    }
    return user;
  }

  /**
   * @throws AccountNotFoundException
   */
  async setRole(userId: number, isAdmin: boolean): Promise<StoredUser> {
    const user = await this.userStore.updateRole(userId, isAdmin);
    if (!user) {
      throw new AccountNotFoundException(userId);
    }

    this.logger.log(
      `Role changed: ${user.id} (${user.username}) is_admin=${user.isAdmin}`,
    );
    return user;
  }

  /**
   * @throws AccountNotFoundException
   */
  async resetPassword(userId: number, password: string): Promise<void> {
    const passwordHash = await this.passwordHasher.hash(password);

    const user = await this.userStore.updatePassword(userId, passwordHash);
    if (!user) {
      throw new AccountNotFoundException(userId);
    }

    this.logger.log(`Password changed: ${user.id} (${user.username})`);
  }

  /**
   * Tokens already issued to the account stop resolving immediately.
   *
   * @throws AccountNotFoundException
   */
  async remove(userId: number): Promise<void> {
    const deleted = await this.userStore.delete(userId);
    if (!deleted) {
      throw new AccountNotFoundException(userId);
    }

    this.logger.log(`User deleted: ${userId}`);
  }

  /**
   * Create the bootstrap admin if no account holds that username.
   * An existing account is left as it is, whatever its role.
   *
   * @returns true if the account was created
   */
  async ensureInitialAdmin(username: string, password: string): Promise<boolean> {
    const existing = await this.userStore.findByUsername(username);
    if (existing) {
      this.logger.log(`Initial admin "${username}" already exists`);
      return false;
    }

    await this.register(username, password, { isAdmin: true });
    return true;
  }
}
