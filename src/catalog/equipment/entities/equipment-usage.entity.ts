import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Film } from '../../films/entities/film.entity';
import { Equipment } from './equipment.entity';

@Entity('equipment_usage')
export class EquipmentUsage {
  @PrimaryColumn({ type: 'integer' })
  film_id!: number;

  @PrimaryColumn({ type: 'integer' })
  equipment_id!: number;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @ManyToOne(() => Equipment, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'equipment_id' })
  equipment?: Equipment;

  @Column({ type: 'date', nullable: true })
  usage_start!: string | null;

  @Column({ type: 'date', nullable: true })
  usage_end!: string | null;
}
