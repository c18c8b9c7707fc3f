import { IsIn } from 'class-validator';
import { PRODUCTION_STATUSES, ProductionStatus } from '../../catalog/films/entities/film.entity';

export class UpdateProductionStatusDto {
  @IsIn(PRODUCTION_STATUSES)
  production_status!: ProductionStatus;
}
