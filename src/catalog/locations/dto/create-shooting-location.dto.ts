import { IsString, IsNotEmpty, IsOptional, IsNumber } from 'class-validator';

export class CreateShootingLocationDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  city?: string;

  @IsOptional()
  @IsString()
  state?: string;

  @IsOptional()
  @IsString()
  country?: string;

  @IsNumber()
  cost_per_day!: number;

  @IsOptional()
  @IsString()
  area?: string;

  @IsOptional()
  @IsString()
  amenities?: string;
}
