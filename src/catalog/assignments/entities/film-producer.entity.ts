import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { Film } from '../../films/entities/film.entity';
import { Producer } from '../../talent/entities/producer.entity';

@Entity('produced_by')
export class FilmProducer {
  @PrimaryColumn({ type: 'integer' })
  film_id!: number;

  @PrimaryColumn({ type: 'integer' })
  producer_id!: number;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @ManyToOne(() => Producer, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'producer_id' })
  producer?: Producer;

  @Column({ type: 'decimal', precision: 15, scale: 2, default: 0, transformer: decimalTransformer })
  investment!: number;
}
