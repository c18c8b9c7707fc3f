import { IsString, IsNotEmpty, IsOptional, IsInt, Min } from 'class-validator';

export class CreateStudioDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  location?: string;

  @IsOptional()
  @IsInt()
  established_year?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  capacity?: number;

  @IsOptional()
  @IsString()
  facilities?: string;
}
