import { IsString, IsNotEmpty, IsOptional, IsInt, Min, IsDateString, ValidateIf } from 'class-validator';

export class UpdateCrewMemberDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  name?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  role?: string;

  @IsOptional()
  @IsDateString()
  dob?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  experience_years?: number;

  @IsOptional()
  @IsString()
  department?: string;

  // null detaches the crew member from its supervisor
  @ValidateIf((_dto, value) => value !== undefined && value !== null)
  @IsInt()
  supervisor_id?: number | null;
}
