import { config } from 'dotenv';
import { DataSource } from 'typeorm';
import { join } from 'path';
import { buildDataSourceOptions } from './typeorm.options';

/**
 * Load env vars from the project root .env file, whether this runs
 * from source or from dist/.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource for CLI-driven migrations.
 *
 * Used by:
 * - `npm run migration:run` — applies pending migrations
 * - `npm run migration:revert` — reverts the last applied migration
 *
 * Dev defaults below MUST be overridden in production.
 */
const AppDataSource = new DataSource(
  buildDataSourceOptions({
    host: process.env['POSTGRES_HOST'] || 'localhost',
    port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
    username: process.env['POSTGRES_USER'] || 'gatehouse',
    password: process.env['POSTGRES_PASSWORD'] || 'gatehouse_secret',
    database: process.env['POSTGRES_DB'] || 'gatehouse',
    connectTimeoutMs: parseInt(
      process.env['POSTGRES_CONNECT_TIMEOUT_MS'] || '3000',
      10,
    ),
    queryTimeoutMs: parseInt(
      process.env['POSTGRES_QUERY_TIMEOUT_MS'] || '5000',
      10,
    ),
    logging: process.env['NODE_ENV'] !== 'production',
  }),
);

export default AppDataSource;
