export { validateEnv } from './config/env.validation';
export type { AppEnv } from './config/env.validation';
export { HealthModule } from './health/health.module';
export { HealthController, STORE_PING_TIMEOUT_MS } from './health/health.controller';
export { setupHttpApp } from './http/setup-http-app';
