import { IsString, IsNotEmpty, IsOptional, IsDateString } from 'class-validator';

export class CreateCertificateDto {
  @IsString()
  @IsNotEmpty()
  rating_board!: string;

  @IsString()
  @IsNotEmpty()
  certificate_rating!: string;

  @IsDateString()
  issue_date!: string;

  @IsOptional()
  @IsDateString()
  expiry_date?: string;

  @IsOptional()
  @IsString()
  content_warnings?: string;
}
