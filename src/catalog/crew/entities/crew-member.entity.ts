import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Index } from 'typeorm';

/**
 * Crew Member Entity
 *
 * Supervision is an optional self-reference; deleting a supervisor clears
 * `supervisor_id` on the people it supervised.
 */
@Entity('crew')
@Index(['supervisor_id'])
export class CrewMember {
  @PrimaryGeneratedColumn()
  crew_id!: number;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'varchar', length: 80 })
  role!: string;

  @Column({ type: 'date', nullable: true })
  dob!: string | null;

  @Column({ type: 'integer', default: 0 })
  experience_years!: number;

  @Column({ type: 'varchar', length: 80, nullable: true })
  department!: string | null;

  @Column({ type: 'integer', nullable: true })
  supervisor_id!: number | null;

  @ManyToOne(() => CrewMember, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'supervisor_id' })
  supervisor?: CrewMember | null;
}
