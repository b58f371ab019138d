// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';

// ── Store ───────────────────────────────────────────────────
export { TypeOrmUserStore } from './stores/typeorm-user.store';

// ── Module & options ────────────────────────────────────────
export { DatabaseModule } from './database.module';
export {
  buildDataSourceOptions,
  typeOrmOptionsFactory,
  ENTITIES,
  MIGRATIONS,
} from './typeorm.options';
export type { PostgresSettings } from './typeorm.options';
