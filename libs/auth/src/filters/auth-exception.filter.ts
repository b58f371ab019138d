import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { AuthError } from '../errors';
import type { AuthErrorKind } from '../errors';

interface AuthErrorResponse {
  status: HttpStatus;
  error: string;
  message: string;
}

const BAD_CREDENTIALS: AuthErrorResponse = {
  status: HttpStatus.UNAUTHORIZED,
  error: 'Unauthorized',
  message: 'Incorrect username or password',
};

const REJECTED_TOKEN: AuthErrorResponse = {
  status: HttpStatus.UNAUTHORIZED,
  error: 'Unauthorized',
  message: 'Could not validate credentials',
};

/**
 * Kind → response. Every token problem shares one body so a client
 * cannot learn whether the signature, the expiry or the account failed.
 */
const RESPONSES: Record<AuthErrorKind, AuthErrorResponse> = {
  InvalidCredentials: BAD_CREDENTIALS,
  TokenMalformed: REJECTED_TOKEN,
  SignatureInvalid: REJECTED_TOKEN,
  TokenExpired: REJECTED_TOKEN,
  UserNotFound: REJECTED_TOKEN,
  MissingCredentials: REJECTED_TOKEN,
  Forbidden: {
    status: HttpStatus.FORBIDDEN,
    error: 'Forbidden',
    message: 'Not enough privileges',
  },
  StoreUnavailable: {
    status: HttpStatus.SERVICE_UNAVAILABLE,
    error: 'Service Unavailable',
    message: 'Service temporarily unavailable',
  },
  HashingError: {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    error: 'Internal Server Error',
    message: 'Internal server error',
  },
};

/** Seconds a client should wait before retrying after a store outage */
const RETRY_AFTER_SECONDS = 5;

/**
 * AuthExceptionFilter — the single place auth errors become HTTP.
 *
 * 401s carry `WWW-Authenticate: Bearer`; 503s carry `Retry-After`.
 * The specific kind is logged, never returned.
 */
@Catch(AuthError)
export class AuthExceptionFilter implements ExceptionFilter<AuthError> {
  private readonly logger = new Logger(AuthExceptionFilter.name);

  catch(exception: AuthError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, error, message } = RESPONSES[exception.kind];

    if (status === HttpStatus.UNAUTHORIZED) {
      response.setHeader('WWW-Authenticate', 'Bearer');
    }

    if (exception.retryable) {
      response.setHeader('Retry-After', String(RETRY_AFTER_SECONDS));
    }

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${exception.kind}: ${exception.message}`,
        exception.cause instanceof Error ? exception.cause.stack : undefined,
      );
    }

    response.status(status).json({ statusCode: status, error, message });
  }
}
