import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

@Entity('studios')
export class Studio {
  @PrimaryGeneratedColumn()
  studio_id!: number;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'varchar', length: 120, nullable: true })
  location!: string | null;

  @Column({ type: 'integer', nullable: true })
  established_year!: number | null;

  @Column({ type: 'integer', nullable: true })
  capacity!: number | null;

  @Column({ type: 'text', nullable: true })
  facilities!: string | null;
}
