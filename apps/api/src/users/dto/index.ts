export { RegisterDto } from './register.dto';
export { ChangePasswordDto } from './change-password.dto';
