import { Column, CreateDateColumn, Entity, Index, PrimaryColumn, UpdateDateColumn } from 'typeorm';
import { nowWithMilliseconds } from '../../common/timestamp-default';
import type { JobStatus } from '../job-status';

@Entity('jobs')
export class Job {
  /** UUID v4, assigned by JobsService */
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Index()
  @Column({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @Column({ type: 'varchar', length: 16, default: 'queued' })
  status!: JobStatus;

  /** Order URL once succeeded, failure reason once failed */
  @Column({ type: 'varchar', length: 255, nullable: true })
  result!: string | null;

  @CreateDateColumn({ name: 'created_at', default: nowWithMilliseconds })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', default: nowWithMilliseconds })
  updatedAt!: Date;
}
