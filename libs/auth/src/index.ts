// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';
export type { AuthModuleOptions } from './auth.module';
export { AUTH_OPTIONS, USER_STORE, TOKEN_TYPE } from './auth.constants';
export {
  authOptionsFactory,
  DEFAULT_BCRYPT_ROUNDS,
  DEFAULT_TOKEN_TTL_SECONDS,
} from './auth.options';

// ── Core services ───────────────────────────────────────────
export { AuthService, toAuthUser } from './auth.service';
export { PasswordHasher } from './password';
export { TokenCodec } from './token';
export * from './accounts';

// ── Guards, decorators, filters ─────────────────────────────
export * from './guards';
export { CurrentUser } from './decorators';
export { AuthExceptionFilter } from './filters';

// ── Errors ──────────────────────────────────────────────────
export * from './errors';

// ── Interfaces & DTOs ───────────────────────────────────────
export type * from './interfaces';
export * from './dto';
