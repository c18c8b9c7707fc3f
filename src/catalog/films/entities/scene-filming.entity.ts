import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Film } from './film.entity';
import { Scene } from './scene.entity';
import { CrewMember } from '../../crew/entities/crew-member.entity';
import { Equipment } from '../../equipment/entities/equipment.entity';

/**
 * Scene Filming Entity - one filming session of a scene by a crew member,
 * optionally with a piece of equipment
 */
@Entity('scene_filmings')
@Index(['film_id'])
@Index(['crew_id'])
@Index(['film_id', 'scene_id', 'crew_id', 'equipment_id'], { unique: true })
export class SceneFilming {
  @PrimaryGeneratedColumn()
  filming_id!: number;

  @Column({ type: 'integer' })
  film_id!: number;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'integer' })
  scene_id!: number;

  @ManyToOne(() => Scene, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'scene_id' })
  scene?: Scene;

  @Column({ type: 'integer' })
  crew_id!: number;

  @ManyToOne(() => CrewMember, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'crew_id' })
  crew?: CrewMember;

  @Column({ type: 'integer', nullable: true })
  equipment_id!: number | null;

  @ManyToOne(() => Equipment, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'equipment_id' })
  equipment?: Equipment | null;

  @Column({ type: 'date', nullable: true })
  filming_date!: string | null;

  @Column({ type: 'integer', nullable: true })
  duration_minutes!: number | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;
}
