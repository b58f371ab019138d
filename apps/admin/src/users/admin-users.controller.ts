import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  UploadedFiles,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { AccountsService, AdminGate, UserProfileDto } from '@gatehouse/auth';
import {
  CreateUserDto,
  ImportResultDto,
  ResetPasswordDto,
  UpdateRoleDto,
} from './dto';
import { UserImportService } from './user-import.service';

/** Most CSV files accepted by one import request */
const MAX_IMPORT_FILES = 10;

/**
 * CSV files are small and parsed in one go, so they stay in memory.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 1024 * 1024, // 1 MB per file
    files: MAX_IMPORT_FILES,
  },
};

/**
 * AdminUsersController — user management for administrators.
 *
 * Every route sits behind AdminGate: a missing or bad token gets 401,
 * a valid non-admin token gets 403.
 *
 * Routes:
 * - GET    /admin/users
 * - GET    /admin/users/:id
 * - POST   /admin/users
 * - POST   /admin/users/import
 * - PATCH  /admin/users/:id/role
 * - PUT    /admin/users/:id/password
 * - DELETE /admin/users/:id
 */
@Controller('admin/users')
@UseGuards(AdminGate)
export class AdminUsersController {
  constructor(
    private readonly accountsService: AccountsService,
    private readonly userImportService: UserImportService,
  ) {}

  @Get()
  async list(): Promise<UserProfileDto[]> {
    const users = await this.accountsService.list();
    return users.map((user) => UserProfileDto.fromUser(user));
  }

  /**
   * @throws 404 Not Found for an unknown id
   */
  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<UserProfileDto> {
    return UserProfileDto.fromUser(await this.accountsService.get(id));
  }

  /**
   * @returns 201 Created
   * @throws 409 Conflict if the username is taken
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() dto: CreateUserDto): Promise<UserProfileDto> {
    const user = await this.accountsService.register(dto.username, dto.password, {
      isAdmin: dto.is_admin ?? false,
    });
    return UserProfileDto.fromUser(user);
  }

  /**
   * Multipart upload of one or more CSV files under the field `files`.
   * Valid rows are created even when others fail.
   *
   * @returns 200 with created and failed counts and one message per failure
   * @throws 400 Bad Request if no file is attached
   */
  @Post('import')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FilesInterceptor('files', MAX_IMPORT_FILES, MULTER_OPTIONS))
  async importCsv(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
  ): Promise<ImportResultDto> {
    if (!files || files.length === 0) {
      throw new BadRequestException('Attach at least one CSV file as "files"');
    }

    return ImportResultDto.fromReport(await this.userImportService.importFiles(files));
  }

  /**
   * Takes effect on the user's next request; no re-login needed.
   */
  @Patch(':id/role')
  async setRole(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateRoleDto,
  ): Promise<UserProfileDto> {
    return UserProfileDto.fromUser(
      await this.accountsService.setRole(id, dto.is_admin),
    );
  }

  @Put(':id/password')
  @HttpCode(HttpStatus.NO_CONTENT)
  async resetPassword(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ResetPasswordDto,
  ): Promise<void> {
    await this.accountsService.resetPassword(id, dto.password);
  }

  /**
   * Outstanding tokens of the deleted user fail on their next use.
   */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.accountsService.remove(id);
  }
}
