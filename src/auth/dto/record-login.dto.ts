import { IsString, IsNotEmpty, IsBoolean, IsOptional, IsIP } from 'class-validator';

export class RecordLoginDto {
  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsBoolean()
  success!: boolean;

  @IsOptional()
  @IsIP()
  ip_address?: string;
}
