import { IsInt, IsNumber, IsOptional, IsDateString } from 'class-validator';

export class CreateLocationBookingDto {
  @IsInt()
  location_id!: number;

  @IsDateString({ strict: true })
  shooting_start!: string;

  @IsDateString({ strict: true })
  shooting_end!: string;

  // defaults to the location's cost per day
  @IsOptional()
  @IsNumber()
  cost_per_day?: number;
}
