import { IsString, IsNotEmpty, IsOptional, IsInt, IsNumber, IsIn } from 'class-validator';
import { ROLE_IMPORTANCE, RoleImportance } from '../../catalog/casting/entities/cast-role.entity';

export class CastActorInFilmDto {
  @IsInt()
  actor_id!: number;

  @IsInt()
  film_id!: number;

  @IsString()
  @IsNotEmpty()
  character_name!: string;

  @IsOptional()
  @IsIn(ROLE_IMPORTANCE)
  importance?: RoleImportance;

  @IsNumber()
  salary!: number;
}
