import { IsString, MinLength } from 'class-validator';
import { MaxPasswordBytes, PASSWORD_MIN_LENGTH } from '@gatehouse/auth';

export class ResetPasswordDto {
  @IsString()
  @MinLength(PASSWORD_MIN_LENGTH)
  @MaxPasswordBytes()
  password!: string;
}
