import type { HealthCheckService, TypeOrmHealthIndicator } from '@nestjs/terminus';
import { HealthController, STORE_PING_TIMEOUT_MS } from '../../src/health/health.controller';

describe('HealthController', () => {
  it('pings the credential store with a bounded timeout', async () => {
    const pingCheck = jest.fn().mockResolvedValue({ 'credential-store': { status: 'up' } });
    const health = {
      check: jest.fn((indicators: Array<() => Promise<unknown>>) =>
        Promise.all(indicators.map((indicator) => indicator())),
      ),
    };
    const controller = new HealthController(
      health as unknown as HealthCheckService,
      { pingCheck } as unknown as TypeOrmHealthIndicator,
    );

    await controller.check();

    expect(health.check).toHaveBeenCalledTimes(1);
    expect(pingCheck).toHaveBeenCalledWith('credential-store', { timeout: 3000 });
    expect(STORE_PING_TIMEOUT_MS).toBe(3000);
  });
});
