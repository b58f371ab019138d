import { Transform } from 'class-transformer';
import { IsString, MaxLength, MinLength } from 'class-validator';
import {
  MaxPasswordBytes,
  PASSWORD_MAX_BYTES,
  PASSWORD_MIN_LENGTH,
  USERNAME_MAX_LENGTH,
  USERNAME_MIN_LENGTH,
} from '@gatehouse/auth';

/**
 * DTO for public self-registration.
 *
 * There is deliberately no `is_admin` field: with `forbidNonWhitelisted`
 * a request that sends one is rejected with 400.
 */
export class RegisterDto {
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.trim() : value,
  )
  @IsString()
  @MinLength(USERNAME_MIN_LENGTH, {
    message: `Username must be at least ${USERNAME_MIN_LENGTH} characters long`,
  })
  @MaxLength(USERNAME_MAX_LENGTH, {
    message: `Username must be at most ${USERNAME_MAX_LENGTH} characters long`,
  })
  username!: string;

  @IsString()
  @MinLength(PASSWORD_MIN_LENGTH, {
    message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`,
  })
  @MaxPasswordBytes({
    message: `Password must be at most ${PASSWORD_MAX_BYTES} bytes long`,
  })
  password!: string;
}
