import { z } from 'zod';
import {
  fitsPasswordLimit,
  PASSWORD_MAX_BYTES,
  PASSWORD_MIN_LENGTH,
} from '@gatehouse/auth';

const port = z.coerce.number().int().positive().max(65535);

const password = z
  .string()
  .min(PASSWORD_MIN_LENGTH)
  .refine(fitsPasswordLimit, {
    message: `Must be at most ${PASSWORD_MAX_BYTES} bytes`,
  });

/**
 * Environment schema shared by the public API and the admin service.
 * Numbers arrive as strings and are coerced; defaults suit local dev.
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).optional(),

    API_PORT: port.default(8000),
    ADMIN_PORT: port.default(8001),
    CORS_ORIGIN: z.string().min(1).default('http://localhost:3000'),

    POSTGRES_HOST: z.string().min(1).default('localhost'),
    POSTGRES_PORT: port.default(5432),
    POSTGRES_USER: z.string().min(1).default('gatehouse'),
    POSTGRES_PASSWORD: z.string().min(1).default('gatehouse_secret'),
    POSTGRES_DB: z.string().min(1).default('gatehouse'),
    POSTGRES_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
    POSTGRES_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

    JWT_SECRET: z.string().min(16),
    JWT_EXPIRATION: z.coerce.number().int().min(60).max(86_400).default(1800),
    BCRYPT_SALT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

    INITIAL_ADMIN_USERNAME: z.string().trim().min(3).max(100).optional(),
    INITIAL_ADMIN_PASSWORD: password.optional(),

    IMPORT_DEFAULT_PASSWORD: password.optional(),
  })
  .refine(
    (env) =>
      (env.INITIAL_ADMIN_USERNAME === undefined) ===
      (env.INITIAL_ADMIN_PASSWORD === undefined),
    {
      message: 'Set both or neither',
      path: ['INITIAL_ADMIN_PASSWORD'],
    },
  );

export type AppEnv = z.infer<typeof envSchema>;

/**
 * `validate` hook for ConfigModule.forRoot.
 *
 * Fails fast at startup. The message names offending keys only, never
 * their values, since some of them are secrets.
 *
 * @throws Error listing the missing or invalid keys
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const keys = Array.from(
      new Set(
        result.error.issues
          .map((issue) => issue.path[0])
          .filter((key): key is string => typeof key === 'string'),
      ),
    );

    throw new Error(
      `Invalid environment configuration. Missing/invalid: ${keys.join(', ')}. ` +
        'See .env.example.',
    );
  }

  return result.data;
}
