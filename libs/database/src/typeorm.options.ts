import { ConfigService } from '@nestjs/config';
import type { DataSourceOptions } from 'typeorm';
import { User } from './entities/user.entity';
import { CreateUsers1760832000000 } from './migrations/1760832000000-CreateUsers';

/** All entity classes registered in this database library */
export const ENTITIES = [User] as const;

export const MIGRATIONS = [CreateUsers1760832000000] as const;

/**
 * Connection settings as read from the environment.
 * Field names mirror the POSTGRES_* variables.
 */
export interface PostgresSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
  queryTimeoutMs: number;
  logging: boolean;
}

/**
 * TypeORM options shared by both services and the migration CLI.
 *
 * Both pg timeouts are set so a dead database turns into an error
 * instead of a request that never returns.
 */
export function buildDataSourceOptions(
  settings: PostgresSettings,
): DataSourceOptions {
  return {
    type: 'postgres',
    host: settings.host,
    port: settings.port,
    username: settings.username,
    password: settings.password,
    database: settings.database,
    entities: [...ENTITIES],
    migrations: [...MIGRATIONS],
    synchronize: false,
    logging: settings.logging,
    extra: {
      connectionTimeoutMillis: settings.connectTimeoutMs,
      query_timeout: settings.queryTimeoutMs,
    },
  };
}

/**
 * Factory for `TypeOrmModule.forRootAsync({ inject: [ConfigService] })`.
 * Migrations are left to the caller; only the public API runs them.
 */
export function typeOrmOptionsFactory(
  configService: ConfigService,
): DataSourceOptions {
  return buildDataSourceOptions({
    host: configService.get<string>('POSTGRES_HOST', 'localhost'),
    port: configService.get<number>('POSTGRES_PORT', 5432),
    username: configService.get<string>('POSTGRES_USER', 'gatehouse'),
    password: configService.get<string>(
      'POSTGRES_PASSWORD',
      'gatehouse_secret',
    ),
    database: configService.get<string>('POSTGRES_DB', 'gatehouse'),
    connectTimeoutMs: configService.get<number>(
      'POSTGRES_CONNECT_TIMEOUT_MS',
      3000,
    ),
    queryTimeoutMs: configService.get<number>(
      'POSTGRES_QUERY_TIMEOUT_MS',
      5000,
    ),
    logging: configService.get<string>('NODE_ENV') === 'development',
  });
}
