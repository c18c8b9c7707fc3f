import { IsInt, IsNumber, IsOptional, IsDateString, Min } from 'class-validator';

export class CreateStudioBookingDto {
  @IsInt()
  studio_id!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  rental_cost?: number;

  @IsOptional()
  @IsDateString()
  rental_start?: string;

  @IsOptional()
  @IsDateString()
  rental_end?: string;
}
