import { IsString, IsOptional, IsInt, Min } from 'class-validator';

export class CreateSceneDto {
  @IsOptional()
  @IsString()
  location?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  duration?: number;
}
