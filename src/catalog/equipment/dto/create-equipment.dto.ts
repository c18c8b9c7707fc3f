import { IsString, IsNotEmpty, IsOptional, IsNumber, IsDateString, IsIn } from 'class-validator';
import { AVAILABILITY_STATES, Availability } from '../entities/equipment.entity';

export class CreateEquipmentDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  type?: string;

  @IsNumber()
  cost!: number;

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
