import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';
import type { Availability } from '../../catalog/equipment/entities/equipment.entity';

@Entity('equipment_audit')
@Index(['equipment_id', 'timestamp'])
export class EquipmentAudit {
  @PrimaryGeneratedColumn()
  audit_id!: number;

  @Column({ type: 'integer' })
  equipment_id!: number;

  @Column({ type: 'varchar', length: 120 })
  equipment_name!: string;

  @Column({ type: 'varchar', length: 20 })
  old_availability!: Availability;

  @Column({ type: 'varchar', length: 20 })
  new_availability!: Availability;

  @Column({ type: 'varchar', length: 10, default: 'UPDATE' })
  action!: 'UPDATE';

  @CreateDateColumn()
  timestamp!: Date;
}
