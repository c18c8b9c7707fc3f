import { IsIn } from 'class-validator';
import { AVAILABILITY_STATES, Availability } from '../../catalog/equipment/entities/equipment.entity';

export class UpdateEquipmentStatusDto {
  @IsIn(AVAILABILITY_STATES)
  availability!: Availability;
}
