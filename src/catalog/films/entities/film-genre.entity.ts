import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Film } from './film.entity';

@Entity('film_genres')
export class FilmGenre {
  @PrimaryColumn({ type: 'integer' })
  film_id!: number;

  @PrimaryColumn({ type: 'varchar', length: 60 })
  genre!: string;

  @ManyToOne(() => Film, (film) => film.genres, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'boolean', default: false })
  is_primary!: boolean;
}
