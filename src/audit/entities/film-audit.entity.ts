import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';
import { decimalTransformer } from '../../common/transformers/decimal.transformer';
import type { ProductionStatus } from '../../catalog/films/entities/film.entity';

/**
 * STATUS_CHANGE rows come from any film update that moves the status;
 * STATUS_UPDATE rows come from the update-production-status operation.
 */
export type FilmAuditAction = 'STATUS_CHANGE' | 'STATUS_UPDATE';

@Entity('film_audit')
@Index(['film_id', 'timestamp'])
export class FilmAudit {
  @PrimaryGeneratedColumn()
  audit_id!: number;

  @Column({ type: 'integer' })
  film_id!: number;

  @Column({ type: 'varchar', length: 200 })
  film_title!: string;

  @Column({ type: 'varchar', length: 20 })
  old_status!: ProductionStatus;

  @Column({ type: 'varchar', length: 20 })
  new_status!: ProductionStatus;

  @Column({ type: 'decimal', precision: 15, scale: 2, nullable: true, transformer: decimalTransformer })
  old_budget!: number | null;

  @Column({ type: 'decimal', precision: 15, scale: 2, nullable: true, transformer: decimalTransformer })
  new_budget!: number | null;

  @Column({ type: 'varchar', length: 20 })
  action!: FilmAuditAction;

  @Column({ type: 'text', nullable: true })
  message!: string | null;

  @CreateDateColumn()
  timestamp!: Date;
}
