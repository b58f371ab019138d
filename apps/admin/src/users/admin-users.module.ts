import { Module } from '@nestjs/common';
import { AdminUsersController } from './admin-users.controller';
import { UserImportService } from './user-import.service';

@Module({
  controllers: [AdminUsersController],
  providers: [UserImportService],
})
export class AdminUsersModule {}
