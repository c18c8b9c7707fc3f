import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { Actor } from '../../talent/entities/actor.entity';
import { Film } from '../../films/entities/film.entity';

export type RoleImportance = 'Lead' | 'Supporting' | 'Cameo';

export const ROLE_IMPORTANCE: readonly RoleImportance[] = ['Lead', 'Supporting', 'Cameo'];

/**
 * Cast Role Entity - an actor playing a named character in a film
 *
 * Inserts and deletes made through CastingService are written to `role_audit`.
 */
@Entity('roles')
@Index(['actor_id', 'film_id', 'character_name'], { unique: true })
@Index(['film_id'])
export class CastRole {
  @PrimaryGeneratedColumn()
  role_id!: number;

  @Column({ type: 'integer' })
  actor_id!: number;

  @ManyToOne(() => Actor, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'actor_id' })
  actor?: Actor;

  @Column({ type: 'integer' })
  film_id!: number;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'varchar', length: 120 })
  character_name!: string;

  @Column({ type: 'integer', default: 0 })
  screen_time!: number; // minutes

  @Column({ type: 'varchar', length: 20, default: 'Supporting' })
  importance!: RoleImportance;

  @Column({ type: 'decimal', precision: 14, scale: 2, default: 0, transformer: decimalTransformer })
  salary!: number;
}
