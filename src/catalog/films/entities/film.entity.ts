import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { Director } from '../../talent/entities/director.entity';
import { FilmGenre } from './film-genre.entity';

export type ProductionStatus = 'Pre-Production' | 'In Progress' | 'Post-Production' | 'Released';

export const PRODUCTION_STATUSES: readonly ProductionStatus[] = [
  'Pre-Production',
  'In Progress',
  'Post-Production',
  'Released',
];

/**
 * Film Entity
 *
 * `release_date` stays null until the film is released. Deleting the director
 * clears `director_id`; every dependent production row cascades with the film.
 */
@Entity('films')
@Index(['director_id'])
@Index(['production_status'])
export class Film {
  @PrimaryGeneratedColumn()
  film_id!: number;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'date', nullable: true })
  release_date!: string | null;

  @Column({ type: 'decimal', precision: 15, scale: 2, default: 0, transformer: decimalTransformer })
  budget!: number;

  @Column({ type: 'integer', nullable: true })
  duration!: number | null; // minutes

  @Column({ type: 'varchar', length: 80, nullable: true })
  language!: string | null;

  @Column({ type: 'decimal', precision: 15, scale: 2, default: 0, transformer: decimalTransformer })
  boxoffice_collection!: number;

  @Column({ type: 'decimal', precision: 3, scale: 1, nullable: true, transformer: decimalTransformer })
  rating!: number | null;

  @Column({ type: 'integer', nullable: true })
  director_id!: number | null;

  @ManyToOne(() => Director, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'director_id' })
  director?: Director | null;

  @Column({ type: 'varchar', length: 60, nullable: true })
  primary_genre!: string | null;

  @Column({ type: 'varchar', length: 20, default: 'Pre-Production' })
  production_status!: ProductionStatus;

  @OneToMany(() => FilmGenre, (genre) => genre.film)
  genres?: FilmGenre[];

  @CreateDateColumn()
  created_date!: Date;

  @UpdateDateColumn()
  updated_date!: Date;
}
