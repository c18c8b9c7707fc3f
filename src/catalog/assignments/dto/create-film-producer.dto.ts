import { IsInt, IsNumber, IsOptional, Min } from 'class-validator';

export class CreateFilmProducerDto {
  @IsInt()
  producer_id!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  investment?: number;
}
