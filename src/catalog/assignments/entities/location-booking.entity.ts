import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { Film } from '../../films/entities/film.entity';
import { ShootingLocation } from '../../locations/entities/shooting-location.entity';

/**
 * Location Booking Entity - a film shooting at a location over an inclusive date range
 */
@Entity('shot_at')
export class LocationBooking {
  @PrimaryColumn({ type: 'integer' })
  film_id!: number;

  @PrimaryColumn({ type: 'integer' })
  location_id!: number;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @ManyToOne(() => ShootingLocation, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'location_id' })
  location?: ShootingLocation;

  @Column({ type: 'date' })
  shooting_start!: string;

  @Column({ type: 'date' })
  shooting_end!: string;

  @Column({ type: 'decimal', precision: 15, scale: 2, default: 0, transformer: decimalTransformer })
  total_cost!: number;
}
