import { IsInt, IsNumber, IsOptional, IsString, IsDateString, Min } from 'class-validator';

export class CreateFilmDistributionDto {
  @IsInt()
  distributor_id!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  distribution_fee?: number;

  @IsOptional()
  @IsDateString()
  distribution_date?: string;

  @IsOptional()
  @IsString()
  territory?: string;
}
