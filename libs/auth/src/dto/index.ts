export * from './credential.constraints';
export { MaxPasswordBytes } from './max-password-bytes.validator';
export { LoginDto } from './login.dto';
export { TokenResponseDto } from './token-response.dto';
export { UserProfileDto } from './user-profile.dto';
