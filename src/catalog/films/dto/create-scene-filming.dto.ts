import { IsString, IsOptional, IsInt, IsDateString, Min } from 'class-validator';

export class CreateSceneFilmingDto {
  @IsInt()
  scene_id!: number;

  @IsInt()
  crew_id!: number;

  @IsOptional()
  @IsInt()
  equipment_id?: number;

  @IsOptional()
  @IsDateString()
  filming_date?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  duration_minutes?: number;

  @IsOptional()
  @IsString()
  notes?: string;
}
