import { IsInt, IsOptional, IsDateString } from 'class-validator';

export class AllocateCrewDto {
  @IsInt()
  crew_id!: number;

  @IsInt()
  film_id!: number;

  @IsOptional()
  @IsDateString()
  start_date?: string;

  @IsOptional()
  @IsDateString()
  end_date?: string;
}
