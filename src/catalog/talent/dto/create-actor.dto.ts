import { IsString, IsNotEmpty, IsOptional, IsDateString, IsIn } from 'class-validator';
import { GENDERS, Gender } from '../entities/actor.entity';

export class CreateActorDto {
  @IsString()
  @IsNotEmpty()
  first_name!: string;

  @IsString()
  @IsNotEmpty()
  last_name!: string;

  @IsDateString()
  dob!: string;

  @IsOptional()
  @IsIn(GENDERS)
  gender?: Gender;

  @IsOptional()
  @IsString()
  nationality?: string;

  @IsOptional()
  @IsString()
  stage_name?: string;
}
