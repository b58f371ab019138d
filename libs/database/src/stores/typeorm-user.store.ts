import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository, TypeORMError } from 'typeorm';
import {
  DuplicateUsernameError,
  StoreUnavailableError,
} from '@gatehouse/auth';
import type { NewUser, StoredUser, UserStore } from '@gatehouse/auth';
import { User } from '../entities/user.entity';

/** PostgreSQL SQLSTATE for unique_violation */
const UNIQUE_VIOLATION = '23505';

/**
 * SQLSTATE classes meaning "the database is not there right now":
 * 08 connection exception, 53 insufficient resources,
 * 57P operator intervention (shutdown, crash recovery).
 */
const UNAVAILABLE_SQLSTATE = /^(08|53|57P)/;

/**
 * TypeOrmUserStore — the credential store on PostgreSQL.
 *
 * Error translation:
 * - unique violation on username → DuplicateUsernameError
 * - connection failures and pg timeouts → StoreUnavailableError
 * - any other query failure propagates as a server fault
 */
@Injectable()
export class TypeOrmUserStore implements UserStore {
  private readonly logger = new Logger(TypeOrmUserStore.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  findByUsername(username: string): Promise<StoredUser | null> {
    return this.run(() =>
      this.userRepository.findOne({ where: { username } }),
    );
  }

  findById(id: number): Promise<StoredUser | null> {
    return this.run(() => this.userRepository.findOne({ where: { id } }));
  }

  findAll(): Promise<StoredUser[]> {
    return this.run(() => this.userRepository.find({ order: { id: 'ASC' } }));
  }

  async create(user: NewUser): Promise<StoredUser> {
    try {
      return await this.run(() =>
        this.userRepository.save(this.userRepository.create(user)),
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateUsernameError(user.username, { cause: error });
      }
      throw error;
    }
  }

  updateRole(id: number, isAdmin: boolean): Promise<StoredUser | null> {
    return this.updateAndReload(id, { isAdmin });
  }

  updatePassword(id: number, passwordHash: string): Promise<StoredUser | null> {
    return this.updateAndReload(id, { passwordHash });
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.run(() => this.userRepository.delete({ id }));
    return (result.affected ?? 0) > 0;
  }

  private async updateAndReload(
    id: number,
    changes: Partial<Pick<User, 'isAdmin' | 'passwordHash'>>,
  ): Promise<StoredUser | null> {
    const result = await this.run(() =>
      this.userRepository.update({ id }, changes),
    );

    if ((result.affected ?? 0) === 0) {
      return null;
    }

    return this.findById(id);
  }

  /**
   * Run a repository call, converting outages to StoreUnavailableError.
   * Never retries; that is left to the caller.
   */
  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isUnavailable(error)) {
        this.logger.error(
          `Credential store unavailable: ${describe(error)}`,
        );
        throw new StoreUnavailableError(error);
      }
      throw error;
    }
  }
}

function driverCode(error: QueryFailedError): string | undefined {
  const { driverError } = error;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    const { code } = driverError;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof QueryFailedError && driverCode(error) === UNIQUE_VIOLATION;
}

/**
 * Failures that happen before a query reaches the server (pool connect
 * errors, ECONNREFUSED) are not QueryFailedErrors. pg timeouts are, but
 * carry no SQLSTATE. ORM and programming errors are never outages.
 */
function isUnavailable(error: unknown): boolean {
  if (error instanceof QueryFailedError) {
    const code = driverCode(error);
    return code === undefined || UNAVAILABLE_SQLSTATE.test(code);
  }

  if (
    error instanceof TypeORMError ||
    error instanceof TypeError ||
    error instanceof RangeError ||
    error instanceof ReferenceError
  ) {
    return false;
  }

  return error instanceof Error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
