import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';

@Entity('distributors')
export class Distributor {
  @PrimaryGeneratedColumn()
  distributor_id!: number;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'varchar', length: 80, nullable: true })
  region!: string | null;

  @Column({ type: 'decimal', precision: 5, scale: 2, default: 0, transformer: decimalTransformer })
  market_share!: number; // percent
}
