import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { setupHttpApp } from '@gatehouse/common';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  // ── Global pipes, serializer, auth error filter ───────
  setupHttpApp(app);

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', 'http://localhost:3000'),
    credentials: true,
  });

  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = configService.get<number>('API_PORT', 8000);
  await app.listen(port);

  logger.log(`Public API running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Public API failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
