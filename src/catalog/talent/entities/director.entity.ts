import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';
import type { Gender } from './actor.entity';

@Entity('directors')
export class Director {
  @PrimaryGeneratedColumn()
  director_id!: number;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'date', nullable: true })
  dob!: string | null;

  @Column({ type: 'varchar', length: 10, default: 'Other' })
  gender!: Gender;

  @Column({ type: 'varchar', length: 80, nullable: true })
  nationality!: string | null;
}
