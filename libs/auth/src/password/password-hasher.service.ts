import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { randomBytes } from 'crypto';
import * as bcrypt from 'bcrypt';
import { AUTH_OPTIONS } from '../auth.constants';
import {
  passwordByteLength,
  PASSWORD_MAX_BYTES,
} from '../dto/credential.constraints';
import { HashingError, PasswordTooLongError } from '../errors';
import type { AuthOptions } from '../interfaces';

/**
 * PasswordHasher — salted, deliberately slow one-way hashing via bcrypt.
 *
 * `verify()` never throws: a corrupt stored hash and a wrong password
 * both come back as `false`, so callers cannot tell them apart.
 *
 * bcrypt ignores everything past 72 bytes. `hash()` refuses such input
 * and `verify()` never matches it, so two passwords sharing a 72-byte
 * prefix cannot stand in for each other.
 *
 * A dummy hash at the configured cost is computed once at module init.
 * Login compares against it when the username is unknown, keeping the
 * response time of "no such user" in line with "wrong password".
 */
@Injectable()
export class PasswordHasher implements OnModuleInit {
  private readonly logger = new Logger(PasswordHasher.name);
  private dummyHash: Promise<string> | undefined;

  constructor(@Inject(AUTH_OPTIONS) private readonly options: AuthOptions) {}

  async onModuleInit(): Promise<void> {
    await this.getDummyHash();
  }

  /**
   * @throws PasswordTooLongError above 72 UTF-8 bytes
   * @throws HashingError if bcrypt fails (entropy or resource exhaustion)
   */
  async hash(plaintext: string): Promise<string> {
    const byteLength = passwordByteLength(plaintext);
    if (byteLength > PASSWORD_MAX_BYTES) {
      throw new PasswordTooLongError(byteLength, PASSWORD_MAX_BYTES);
    }

    try {
      return await bcrypt.hash(plaintext, this.options.bcryptRounds);
    } catch (error) {
      throw new HashingError(error);
    }
  }

  async verify(plaintext: string, hash: string): Promise<boolean> {
    try {
      // Compare even when too long, so rejection costs the same time
      const matches = await bcrypt.compare(plaintext, hash);
      return matches && passwordByteLength(plaintext) <= PASSWORD_MAX_BYTES;
    } catch (error) {
      // Malformed hash: report a plain mismatch
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Stored password hash could not be compared: ${reason}`);
      return false;
    }
  }

  /**
   * Run a full comparison that can never succeed. Always resolves `false`.
   */
  async verifyAgainstDummy(plaintext: string): Promise<false> {
    await this.verify(plaintext, await this.getDummyHash());
    return false;
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.hash(randomBytes(24).toString('base64')).catch(
        (error: unknown) => {
          this.dummyHash = undefined;
          throw error;
        },
      );
    }
    return this.dummyHash;
  }
}
