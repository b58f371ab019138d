import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthService } from './auth.service';
import { CurrentUser } from './decorators';
import { LoginDto, TokenResponseDto, UserProfileDto } from './dto';
import { AccessGuard } from './guards';
import type { AuthUser } from './interfaces';

/**
 * AuthController — token endpoints, mounted by both services.
 *
 * Routes:
 * - POST /auth/login → exchange username + password for a bearer token (public)
 * - GET  /auth/me    → the identity behind the presented token (protected)
 *
 * There is no logout route: tokens are stateless, so logging out means
 * the client discards its token. It stays valid until it expires.
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 200 OK with `{ access_token, token_type, expires_in }`
   * @throws 401 Unauthorized with the same body for unknown user and wrong password
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<TokenResponseDto> {
    const accessToken = await this.authService.login(dto.username, dto.password);
    return new TokenResponseDto(accessToken, this.authService.tokenTtlSeconds);
  }

  /**
   * @returns 200 OK with `{ id, username, is_admin }`
   * @throws 401 Unauthorized if the token is missing, invalid, expired or orphaned
   */
  @Get('me')
  @UseGuards(AccessGuard)
  me(@CurrentUser() user: AuthUser): UserProfileDto {
    return UserProfileDto.fromUser(user);
  }
}
