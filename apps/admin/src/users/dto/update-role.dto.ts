import { IsBoolean } from 'class-validator';

export class UpdateRoleDto {
  @IsBoolean()
  is_admin!: boolean;
}
