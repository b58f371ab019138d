import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '@gatehouse/auth';
import { HealthModule, validateEnv } from '@gatehouse/common';
import { DatabaseModule, typeOrmOptionsFactory } from '@gatehouse/database';
import { InitialAdminService } from './bootstrap/initial-admin.service';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnv,
    }),

    // ── Database (pending migrations run here, not in admin) ──
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ...typeOrmOptionsFactory(configService),
        migrationsRun: true,
      }),
    }),

    // ── Authentication (POST /auth/login, GET /auth/me) ───
    AuthModule.forRoot({ store: DatabaseModule.forFeature() }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    UsersModule,
  ],
  providers: [InitialAdminService],
})
export class AppModule {}
