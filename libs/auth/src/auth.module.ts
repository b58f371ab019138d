import { DynamicModule, Module, ModuleMetadata } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountsService } from './accounts';
import { AUTH_OPTIONS } from './auth.constants';
import { AuthController } from './auth.controller';
import { authOptionsFactory } from './auth.options';
import { AuthService } from './auth.service';
import { PasswordHasher } from './password';
import { TokenCodec } from './token';

export interface AuthModuleOptions {
  /**
   * Module that provides and exports the `USER_STORE` token:
   * `DatabaseModule.forFeature()` in the services, an in-memory
   * store in tests.
   */
  store: NonNullable<ModuleMetadata['imports']>[number];
}

/**
 * AuthModule — everything both services need to authenticate callers.
 *
 * Provides:
 * - PasswordHasher and TokenCodec, configured from JWT_SECRET,
 *   JWT_EXPIRATION and BCRYPT_SALT_ROUNDS via ConfigService
 * - AuthService (login / resolve) and AccountsService
 * - POST /auth/login and GET /auth/me
 *
 * Registered as global so `AccessGuard` and `AdminGate` can resolve
 * AuthService from any feature module without importing this one.
 * Requires a global ConfigModule.
 */
@Module({})
export class AuthModule {
  static forRoot(options: AuthModuleOptions): DynamicModule {
    return {
      module: AuthModule,
      global: true,
      imports: [options.store],
      controllers: [AuthController],
      providers: [
        {
          provide: AUTH_OPTIONS,
          inject: [ConfigService],
          useFactory: authOptionsFactory,
        },
        PasswordHasher,
        TokenCodec,
        AuthService,
        AccountsService,
      ],
      exports: [AuthService, AccountsService, PasswordHasher, TokenCodec],
    };
  }
}
