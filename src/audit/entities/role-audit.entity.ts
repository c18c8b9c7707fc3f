import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';
import { decimalTransformer } from '../../common/transformers/decimal.transformer';

export type RoleAuditAction = 'INSERT' | 'DELETE';

@Entity('role_audit')
@Index(['film_id', 'timestamp'])
@Index(['actor_id', 'timestamp'])
export class RoleAudit {
  @PrimaryGeneratedColumn()
  audit_id!: number;

  @Column({ type: 'integer' })
  actor_id!: number;

  @Column({ type: 'integer' })
  film_id!: number;

  @Column({ type: 'varchar', length: 120 })
  character_name!: string;

  @Column({ type: 'decimal', precision: 14, scale: 2, default: 0, transformer: decimalTransformer })
  salary!: number;

  @Column({ type: 'varchar', length: 10 })
  action!: RoleAuditAction;

  @CreateDateColumn()
  timestamp!: Date;
}
