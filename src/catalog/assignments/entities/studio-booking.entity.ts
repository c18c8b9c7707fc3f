import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { Film } from '../../films/entities/film.entity';
import { Studio } from '../../partners/entities/studio.entity';

@Entity('hosts')
export class StudioBooking {
  @PrimaryColumn({ type: 'integer' })
  studio_id!: number;

  @PrimaryColumn({ type: 'integer' })
  film_id!: number;

  @ManyToOne(() => Studio, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studio_id' })
  studio?: Studio;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'decimal', precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  rental_cost!: number;

  @Column({ type: 'date', nullable: true })
  rental_start!: string | null;

  @Column({ type: 'date', nullable: true })
  rental_end!: string | null;
}
