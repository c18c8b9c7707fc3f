import { Entity, Column, PrimaryGeneratedColumn, OneToOne, JoinColumn } from 'typeorm';
import { Film } from './film.entity';

/**
 * Film Certificate Entity - at most one certificate per film
 */
@Entity('film_certificates')
export class FilmCertificate {
  @PrimaryGeneratedColumn()
  certificate_id!: number;

  @Column({ type: 'integer', unique: true })
  film_id!: number;

  @OneToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'varchar', length: 80 })
  rating_board!: string;

  @Column({ type: 'varchar', length: 20 })
  certificate_rating!: string;

  @Column({ type: 'date' })
  issue_date!: string;

  @Column({ type: 'date', nullable: true })
  expiry_date!: string | null;

  @Column({ type: 'text', nullable: true })
  content_warnings!: string | null;
}
