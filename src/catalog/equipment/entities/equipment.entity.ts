import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';

export type Availability = 'Available' | 'In Use' | 'Under Maintenance';

export const AVAILABILITY_STATES: readonly Availability[] = ['Available', 'In Use', 'Under Maintenance'];

@Entity('equipment')
export class Equipment {
  @PrimaryGeneratedColumn()
  equipment_id!: number;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'varchar', length: 80, nullable: true })
  type!: string | null;

  @Column({ type: 'decimal', precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  cost!: number;

  @Column({ type: 'date', nullable: true })
  purchase_date!: string | null;

  @Column({ type: 'varchar', length: 40, default: 'Good' })
  condition!: string;

  @Column({ type: 'varchar', length: 20, default: 'Available' })
  availability!: Availability;
}
