import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { nowWithMilliseconds } from '../../common/timestamp-default';
import type { OrderState } from '../order-state';

/**
 * One row per state change of an order, creation included (fromState null).
 */
@Entity('order_logs')
export class OrderLog {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @Column({ name: 'from_state', type: 'varchar', length: 16, nullable: true })
  fromState!: OrderState | null;

  @Column({ name: 'to_state', type: 'varchar', length: 16 })
  toState!: OrderState;

  @CreateDateColumn({ default: nowWithMilliseconds })
  timestamp!: Date;
}
