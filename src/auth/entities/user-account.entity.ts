import { Entity, Column, PrimaryColumn, CreateDateColumn, Index } from 'typeorm';

export type UserRole = 'admin' | 'manager' | 'viewer';

export const USER_ROLES: readonly UserRole[] = ['admin', 'manager', 'viewer'];

/**
 * User Account Entity
 *
 * Identity is the username. `password_hash` is excluded from default selects;
 * load it explicitly with `addSelect` when verifying credentials.
 */
@Entity('user_accounts')
@Index(['role', 'is_active'])
export class UserAccount {
  @PrimaryColumn({ type: 'varchar', length: 50 })
  username!: string;

  @Column({ type: 'varchar', length: 120 })
  full_name!: string;

  @Column({ type: 'varchar', length: 120, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, nullable: true, select: false })
  password_hash?: string | null;

  @Column({ type: 'varchar', length: 20, default: 'viewer' })
  role!: UserRole;

  @Column({ type: 'boolean', default: true })
  is_active!: boolean;

  @CreateDateColumn()
  created_at!: Date;

  @Column({ type: 'varchar', length: 50, nullable: true })
  created_by!: string | null;

  @Column({ type: Date, nullable: true })
  last_login!: Date | null;
}
