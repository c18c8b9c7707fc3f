import { ArrayNotEmpty, IsArray, IsString } from 'class-validator';

export class AddGenresDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  genres!: string[];
}
