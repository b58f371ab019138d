import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { USER_STORE } from '@gatehouse/auth';
import { User } from './entities/user.entity';
import { TypeOrmUserStore } from './stores/typeorm-user.store';

/**
 * DatabaseModule — binds the credential store to PostgreSQL.
 *
 * Import it through AuthModule in both services:
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [AuthModule.forRoot({ store: DatabaseModule.forFeature() })],
 * })
 * export class AppModule {}
 * ```
 *
 * Needs `TypeOrmModule.forRootAsync({ useFactory: typeOrmOptionsFactory })`
 * in the importing application.
 */
@Module({})
export class DatabaseModule {
  /**
   * Registers the User repository and exposes it as `USER_STORE`.
   */
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([User])],
      providers: [{ provide: USER_STORE, useClass: TypeOrmUserStore }],
      exports: [USER_STORE, TypeOrmModule],
    };
  }
}
