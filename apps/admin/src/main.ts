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

  // Same token format and gating code as the public API
  setupHttpApp(app);

  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', 'http://localhost:3000'),
    credentials: true,
  });

  app.enableShutdownHooks();

  const port = configService.get<number>('ADMIN_PORT', 8001);
  await app.listen(port);

  logger.log(`Admin service running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Admin service failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
