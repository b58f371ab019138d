export { CreateUserDto } from './create-user.dto';
export { UpdateRoleDto } from './update-role.dto';
export { ResetPasswordDto } from './reset-password.dto';
export { ImportRowDto } from './import-row.dto';
export { ImportResultDto } from './import-result.dto';
