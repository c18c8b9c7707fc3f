import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsNumber,
  IsInt,
  IsDateString,
  IsIn,
  Min,
  Max,
} from 'class-validator';
import { PRODUCTION_STATUSES, ProductionStatus } from '../entities/film.entity';

export class CreateFilmDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsNumber()
  budget!: number;

  @IsOptional()
  @IsDateString()
  release_date?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  duration?: number;

  @IsOptional()
  @IsString()
  language?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  boxoffice_collection?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(10)
  rating?: number;

  @IsOptional()
  @IsInt()
  director_id?: number;

  @IsOptional()
  @IsString()
  primary_genre?: string;

  @IsOptional()
  @IsIn(PRODUCTION_STATUSES)
  production_status?: ProductionStatus;
}
