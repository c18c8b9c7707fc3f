import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Film } from './film.entity';

@Entity('scenes')
@Index(['film_id'])
export class Scene {
  @PrimaryGeneratedColumn()
  scene_id!: number;

  @Column({ type: 'integer' })
  film_id!: number;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'varchar', length: 200, nullable: true })
  location!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'integer', nullable: true })
  duration!: number | null;
}
