import { ConflictException, NotFoundException } from '@nestjs/common';

/**
 * Thrown when registering or creating a user whose username is taken.
 *
 * HTTP 409 Conflict.
 */
export class UsernameTakenException extends ConflictException {
  constructor(username: string) {
    super({
      statusCode: 409,
      error: 'Conflict',
      message: `User "${username}" already exists`,
    });
  }
}

/**
 * Thrown by admin operations addressing an id with no account.
 *
 * HTTP 404 Not Found.
 */
export class AccountNotFoundException extends NotFoundException {
  constructor(userId: number) {
    super(`User with ID ${userId} not found`);
  }
}
