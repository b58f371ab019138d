import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import {
  AccessGuard,
  AccountsService,
  CurrentUser,
  UserProfileDto,
} from '@gatehouse/auth';
import type { AuthUser } from '@gatehouse/auth';
import { ChangePasswordDto, RegisterDto } from './dto';

/**
 * UsersController — self-service account endpoints.
 *
 * Routes:
 * - POST /users              → register a non-admin account (public)
 * - PUT  /users/me/password  → change own password (protected)
 */
@Controller('users')
export class UsersController {
  constructor(private readonly accountsService: AccountsService) {}

  /**
   * @returns 201 Created with the new user's profile
   * @throws 409 Conflict if the username is taken
   * @throws 400 Bad Request if validation fails
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto): Promise<UserProfileDto> {
    const user = await this.accountsService.register(dto.username, dto.password);
    return UserProfileDto.fromUser(user);
  }

  /**
   * Outstanding tokens stay valid: they carry no password state.
   *
   * @returns 204 No Content
   * @throws 401 Unauthorized if the current password is wrong
   */
  @Put('me/password')
  @UseGuards(AccessGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  async changePassword(
    @CurrentUser() user: AuthUser,
    @Body() dto: ChangePasswordDto,
  ): Promise<void> {
    await this.accountsService.changePassword(
      user.id,
      dto.current_password,
      dto.new_password,
    );
  }
}
