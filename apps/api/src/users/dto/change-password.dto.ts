import { IsNotEmpty, IsString, MinLength } from 'class-validator';
import {
  MaxPasswordBytes,
  PASSWORD_MAX_BYTES,
  PASSWORD_MIN_LENGTH,
} from '@gatehouse/auth';

/** DTO for a user changing their own password */
export class ChangePasswordDto {
  @IsString()
  @IsNotEmpty({ message: 'Current password is required' })
  current_password!: string;

  @IsString()
  @MinLength(PASSWORD_MIN_LENGTH, {
    message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`,
  })
  @MaxPasswordBytes({
    message: `Password must be at most ${PASSWORD_MAX_BYTES} bytes long`,
  })
  new_password!: string;
}
