import { Transform } from 'class-transformer';
import { IsBoolean, IsString, MaxLength, MinLength } from 'class-validator';
import {
  MaxPasswordBytes,
  PASSWORD_MIN_LENGTH,
  USERNAME_MAX_LENGTH,
  USERNAME_MIN_LENGTH,
} from '@gatehouse/auth';

/** Empty means false; otherwise only "true" or "false", in any case */
function parseFlag({ value }: { value: unknown }): unknown {
  if (value === undefined || value === '') {
    return false;
  }
  if (typeof value === 'string') {
    const lowered = value.toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  return value;
}

/**
 * One CSV row of a bulk import, after the default password was filled in.
 * Same limits as CreateUserDto; messages name the CSV column.
 */
export class ImportRowDto {
  @IsString()
  @MinLength(USERNAME_MIN_LENGTH, {
    message: `username must be at least ${USERNAME_MIN_LENGTH} characters long`,
  })
  @MaxLength(USERNAME_MAX_LENGTH, {
    message: `username must be at most ${USERNAME_MAX_LENGTH} characters long`,
  })
  username!: string;

  @IsString()
  @MinLength(PASSWORD_MIN_LENGTH, {
    message: `password must be at least ${PASSWORD_MIN_LENGTH} characters long`,
  })
  @MaxPasswordBytes()
  password!: string;

  @Transform(parseFlag)
  @IsBoolean({ message: 'is_admin must be "true" or "false"' })
  is_admin!: boolean;
}
