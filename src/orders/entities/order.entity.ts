import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { nowWithMilliseconds } from '../../common/timestamp-default';
import type { OrderState } from '../order-state';

@Entity('orders')
export class Order {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Index()
  @Column({ name: 'item_id', type: 'integer' })
  itemId!: number;

  /** YYYY-MM-DD */
  @Column({ name: 'start_date', type: 'date' })
  startDate!: string;

  /** YYYY-MM-DD, never before startDate */
  @Column({ name: 'end_date', type: 'date' })
  endDate!: string;

  @Index()
  @Column({ type: 'varchar', length: 16, default: 'pending' })
  state!: OrderState;

  @CreateDateColumn({ name: 'created_at', default: nowWithMilliseconds })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', default: nowWithMilliseconds })
  updatedAt!: Date;
}
