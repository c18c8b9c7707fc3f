import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { Film } from '../../films/entities/film.entity';
import { Distributor } from '../../partners/entities/distributor.entity';

@Entity('distributes')
export class FilmDistribution {
  @PrimaryColumn({ type: 'integer' })
  distributor_id!: number;

  @PrimaryColumn({ type: 'integer' })
  film_id!: number;

  @ManyToOne(() => Distributor, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'distributor_id' })
  distributor?: Distributor;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'decimal', precision: 15, scale: 2, default: 0, transformer: decimalTransformer })
  distribution_fee!: number;

  @Column({ type: 'date', nullable: true })
  distribution_date!: string | null;

  @Column({ type: 'varchar', length: 80, nullable: true })
  territory!: string | null;
}
