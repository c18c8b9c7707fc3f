import { IsString, IsNotEmpty, IsOptional, IsInt, IsNumber, IsIn, Min } from 'class-validator';
import { ROLE_IMPORTANCE, RoleImportance } from '../entities/cast-role.entity';

export class CreateCastRoleDto {
  @IsInt()
  actor_id!: number;

  @IsInt()
  film_id!: number;

  @IsString()
  @IsNotEmpty()
  character_name!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  screen_time?: number;

  @IsOptional()
  @IsIn(ROLE_IMPORTANCE)
  importance?: RoleImportance;

  @IsNumber()
  salary!: number;
}
