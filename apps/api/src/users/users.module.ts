import { Module } from '@nestjs/common';
import { UsersController } from './users.controller';

/**
 * UsersModule — self-registration and password change.
 * AccountsService comes from the global AuthModule.
 */
@Module({
  controllers: [UsersController],
})
export class UsersModule {}
