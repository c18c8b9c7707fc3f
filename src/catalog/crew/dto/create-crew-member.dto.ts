import { IsString, IsNotEmpty, IsOptional, IsInt, IsDateString } from 'class-validator';

export class CreateCrewMemberDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  role!: string;

  @IsOptional()
  @IsDateString()
  dob?: string;

  @IsOptional()
  @IsInt()
  experience_years?: number;

  @IsOptional()
  @IsString()
  department?: string;

  @IsOptional()
  @IsInt()
  supervisor_id?: number;
}
