import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';

/** Readiness endpoint; needs a TypeORM connection in the importing app */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
})
export class HealthModule {}
