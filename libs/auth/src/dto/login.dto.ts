import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * DTO for login, accepted form-encoded or as JSON.
 *
 * Shaped as an OAuth2 password-grant request: `grant_type`, `scope`,
 * `client_id` and `client_secret` are accepted so standard clients work.
 * Only `grant_type` is checked (it must be `password` when present);
 * scopes and client credentials are not used.
 *
 * Only presence is checked for the credentials. Length rules are left out
 * on purpose: a too-short password must fail the same way a wrong one does.
 */
export class LoginDto {
  @IsOptional()
  @IsIn(['password'], { message: 'grant_type must be "password"' })
  grant_type?: string;

  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;

  @IsOptional()
  @IsString()
  scope?: string;

  @IsOptional()
  @IsString()
  client_id?: string;

  @IsOptional()
  @IsString()
  client_secret?: string;
}
