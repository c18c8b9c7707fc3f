import { IsOptional, IsInt, IsDateString } from 'class-validator';

export class CreateEquipmentUsageDto {
  @IsInt()
  equipment_id!: number;

  @IsOptional()
  @IsDateString()
  usage_start?: string;

  @IsOptional()
  @IsDateString()
  usage_end?: string;
}
