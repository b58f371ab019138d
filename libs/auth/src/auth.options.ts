import { ConfigService } from '@nestjs/config';
import type { AuthOptions } from './interfaces';

export const DEFAULT_TOKEN_TTL_SECONDS = 1800;
export const DEFAULT_BCRYPT_ROUNDS = 12;

/**
 * Build the frozen auth settings from configuration.
 *
 * @throws Error if JWT_SECRET is absent
 */
export function authOptionsFactory(configService: ConfigService): AuthOptions {
  const secret = configService.get<string>('JWT_SECRET');

  if (!secret) {
    throw new Error('JWT_SECRET is not defined. Check your .env file.');
  }

  return Object.freeze({
    secret,
    tokenTtlSeconds: configService.get<number>(
      'JWT_EXPIRATION',
      DEFAULT_TOKEN_TTL_SECONDS,
    ),
    bcryptRounds: configService.get<number>(
      'BCRYPT_SALT_ROUNDS',
      DEFAULT_BCRYPT_ROUNDS,
    ),
  });
}
