import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';

/** Upper bound for the credential store ping, in milliseconds */
export const STORE_PING_TIMEOUT_MS = 3000;

/**
 * GET /health, mounted by both services. Unauthenticated, so
 * orchestrators can poll it without a token.
 * Reports 503 when the credential store does not answer in time.
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly db: TypeOrmHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () =>
        this.db.pingCheck('credential-store', {
          timeout: STORE_PING_TIMEOUT_MS,
        }),
    ]);
  }
}
