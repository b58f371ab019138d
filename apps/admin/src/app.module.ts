import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '@gatehouse/auth';
import { HealthModule, validateEnv } from '@gatehouse/common';
import { DatabaseModule, typeOrmOptionsFactory } from '@gatehouse/database';
import { AdminUsersModule } from './users/admin-users.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnv,
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: typeOrmOptionsFactory,
    }),

    // ── Authentication (shared signing secret) ────────────
    AuthModule.forRoot({ store: DatabaseModule.forFeature() }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AdminUsersModule,
  ],
})
export class AppModule {}
