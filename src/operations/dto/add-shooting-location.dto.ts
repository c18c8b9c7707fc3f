import { IsInt, IsString, IsNotEmpty, IsOptional, IsNumber, IsDateString } from 'class-validator';

export class AddShootingLocationDto {
  @IsInt()
  film_id!: number;

  @IsString()
  @IsNotEmpty()
  location_name!: string;

  @IsOptional()
  @IsString()
  city?: string;

  @IsOptional()
  @IsString()
  country?: string;

  @IsDateString({ strict: true })
  shooting_start!: string;

  @IsDateString({ strict: true })
  shooting_end!: string;

  @IsNumber()
  cost_per_day!: number;
}
