import { IsString, IsNotEmpty, IsOptional, IsIn } from 'class-validator';
import { GENDERS, Gender } from '../entities/actor.entity';

/**
 * Date of birth is fixed at creation; the age rule is only evaluated on insert
 */
export class UpdateActorDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  first_name?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  last_name?: string;

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
