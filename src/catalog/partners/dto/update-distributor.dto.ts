import { IsString, IsNotEmpty, IsOptional, IsNumber } from 'class-validator';

export class UpdateDistributorDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  name?: string;

  @IsOptional()
  @IsString()
  region?: string;

  @IsOptional()
  @IsNumber()
  market_share?: number;
}
