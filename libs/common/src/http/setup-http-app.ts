import {
  ClassSerializerInterceptor,
  INestApplication,
  ValidationPipe,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthExceptionFilter } from '@gatehouse/auth';

/**
 * Global HTTP plumbing shared by both services and their e2e tests.
 *
 * - ValidationPipe rejects unknown fields and builds DTO instances
 * - ClassSerializerInterceptor applies `@Expose` renames on responses
 * - AuthExceptionFilter turns auth errors into 401/403/503
 */
export function setupHttpApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalInterceptors(new ClassSerializerInterceptor(app.get(Reflector)));
  app.useGlobalFilters(new AuthExceptionFilter());

  return app;
}
