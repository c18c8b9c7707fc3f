import { IsString, IsNotEmpty, IsOptional, IsDateString, IsIn } from 'class-validator';
import { GENDERS, Gender } from '../entities/actor.entity';

export class CreateDirectorDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsDateString()
  dob?: string;

  @IsOptional()
  @IsIn(GENDERS)
  gender?: Gender;

  @IsOptional()
  @IsString()
  nationality?: string;
}
