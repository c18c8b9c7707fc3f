import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Film } from '../../films/entities/film.entity';
import { CrewMember } from '../../crew/entities/crew-member.entity';

@Entity('works_on')
export class CrewAssignment {
  @PrimaryColumn({ type: 'integer' })
  crew_id!: number;

  @PrimaryColumn({ type: 'integer' })
  film_id!: number;

  @ManyToOne(() => CrewMember, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'crew_id' })
  crew?: CrewMember;

  @ManyToOne(() => Film, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'film_id' })
  film?: Film;

  @Column({ type: 'date', nullable: true })
  start_date!: string | null;

  @Column({ type: 'date', nullable: true })
  end_date!: string | null;

  @Column({ type: 'varchar', length: 80, nullable: true })
  department!: string | null;
}
