import { IsInt, IsOptional, IsString, IsDateString } from 'class-validator';

export class CreateCrewAssignmentDto {
  @IsInt()
  crew_id!: number;

  @IsOptional()
  @IsDateString()
  start_date?: string;

  @IsOptional()
  @IsDateString()
  end_date?: string;

  @IsOptional()
  @IsString()
  department?: string;
}
