import { IsArray, IsOptional, IsString } from 'class-validator';
import { Transform } from 'class-transformer';
import { CreateFilmDto } from '../../catalog/films/dto/create-film.dto';

/**
 * A film plus its genres, given either as an array or as a comma-separated list
 */
export class AddFilmWithGenresDto extends CreateFilmDto {
  @IsOptional()
  @Transform(({ value }: { value: unknown }) => (typeof value === 'string' ? value.split(',') : value))
  @IsArray()
  @IsString({ each: true })
  genres?: string[];
}

