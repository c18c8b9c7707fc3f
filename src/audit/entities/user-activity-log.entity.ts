import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';

export type UserActivityType =
  | 'USER_CREATED'
  | 'USER_STATUS_CHANGE'
  | 'USER_ROLE_CHANGE'
  | 'USER_DELETED'
  | 'USERS_LISTED'
  | 'LOGIN_SUCCESS'
  | 'LOGIN_FAILED';

@Entity('user_activity_log')
@Index(['username', 'timestamp'])
@Index(['action_type', 'timestamp'])
export class UserActivityLog {
  @PrimaryGeneratedColumn()
  log_id!: number;

  @Column({ type: 'varchar', length: 50 })
  username!: string;

  @Column({ type: 'varchar', length: 30 })
  action_type!: UserActivityType;

  @Column({ type: 'text', nullable: true })
  action_description!: string | null;

  @Column({ type: 'varchar', length: 45, nullable: true })
  ip_address!: string | null;

  @CreateDateColumn()
  timestamp!: Date;
}
