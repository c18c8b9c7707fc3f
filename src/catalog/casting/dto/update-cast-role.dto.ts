import { IsOptional, IsInt, IsNumber, IsIn, Min } from 'class-validator';
import { ROLE_IMPORTANCE, RoleImportance } from '../entities/cast-role.entity';

export class UpdateCastRoleDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  screen_time?: number;

  @IsOptional()
  @IsIn(ROLE_IMPORTANCE)
  importance?: RoleImportance;

  @IsOptional()
  @IsNumber()
  @Min(0)
  salary?: number;
}
