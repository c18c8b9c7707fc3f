import { IsString, IsNotEmpty, IsOptional, IsDateString, IsIn } from 'class-validator';
import { AVAILABILITY_STATES, Availability } from '../entities/equipment.entity';

export class UpdateEquipmentDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  name?: string;

  @IsOptional()
  @IsString()
  type?: string;

  @IsOptional()
  @IsDateString()
  purchase_date?: string;

  @IsOptional()
  @IsString()
  condition?: string;

  @IsOptional()
  @IsIn(AVAILABILITY_STATES)
  availability?: Availability;
}
