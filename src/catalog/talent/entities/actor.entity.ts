import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

export type Gender = 'M' | 'F' | 'Other';

export const GENDERS: readonly Gender[] = ['M', 'F', 'Other'];

/**
 * Actor Entity
 *
 * `dob` is required: the minimum-age rule is evaluated against it on insert.
 */
@Entity('actors')
export class Actor {
  @PrimaryGeneratedColumn()
  actor_id!: number;

  @Column({ type: 'varchar', length: 60 })
  first_name!: string;

  @Column({ type: 'varchar', length: 60 })
  last_name!: string;

  @Column({ type: 'date' })
  dob!: string;

  @Column({ type: 'varchar', length: 10, default: 'Other' })
  gender!: Gender;

  @Column({ type: 'varchar', length: 80, nullable: true })
  nationality!: string | null;

  @Column({ type: 'varchar', length: 120, nullable: true })
  stage_name!: string | null;
}
