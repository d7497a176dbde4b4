import { Inject, Injectable, Logger } from '@nestjs/common';
import { DomainError, NotFoundError } from '../common/errors';
import { Job } from '../jobs/entities/job.entity';
import { JobStatus } from '../jobs/job-status';
import { JobsService } from '../jobs/jobs.service';
import { Order } from '../orders/entities/order.entity';
import { orderLocation } from '../orders/order.presenter';
import { OrdersService } from '../orders/orders.service';
import { CONFIRMATION_POLICY, ConfirmationPolicy } from './confirmation.policy';

/**
 * Runs one confirmation job to a terminal status.
 *
 * The order is always moved before the job, so a poll that sees a finished
 * job also sees the finished order.
 */
@Injectable()
export class ConfirmationWorker {
  private readonly logger = new Logger(ConfirmationWorker.name);

  constructor(
    private readonly ordersService: OrdersService,
    private readonly jobsService: JobsService,
    @Inject(CONFIRMATION_POLICY) private readonly policy: ConfirmationPolicy,
  ) {}

  /**
   * Returns the terminal status reached, or null when the job had already
   * been claimed by an earlier run.
   */
  async run(jobId: string): Promise<JobStatus | null> {
    const claimed = await this.jobsService.setStatus(jobId, 'running');
    if (!claimed) {
      this.logger.warn(`⚠️ Job ${jobId} is not queued, skipping`);
      return null;
    }

    const job = await this.jobsService.get(jobId);
    this.logger.log(`🚀 Processing confirmation | Job: ${job.id} | Order: ${job.orderId}`);

    try {
      return await this.confirm(job);
    } catch (error) {
      return this.recordFailure(job, error);
    }
  }

  private async confirm(job: Job): Promise<JobStatus> {
    const order = await this.findOrder(job.orderId);
    if (!order) {
      return this.finish(job, 'failed', 'order_not_found');
    }
    if (order.state !== 'confirming') {
      return this.finish(job, 'failed', 'invalid_state');
    }

    const decision = await this.policy.decide(order);

    if (decision.approved) {
      await this.ordersService.transition(order.id, 'confirming', 'confirmed');
      this.logger.log(`✅ Order ${order.id} confirmed | Job: ${job.id}`);
      return this.finish(job, 'succeeded', orderLocation(order.id));
    }

    await this.ordersService.transition(order.id, 'confirming', 'failed');
    this.logger.warn(`Order ${order.id} rejected | Job: ${job.id} | Reason: ${decision.reason ?? 'n/a'}`);
    return this.finish(job, 'failed', `rejected: ${decision.reason ?? 'unspecified'}`);
  }

  private async recordFailure(job: Job, error: unknown): Promise<JobStatus> {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.logger.error(
      `❌ Confirmation failed | Job: ${job.id} | Order: ${job.orderId} | Error: ${failure.message}`,
      failure.stack,
    );

    try {
      await this.ordersService.transition(job.orderId, 'confirming', 'failed');
    } catch (transitionError) {
      // Order already left `confirming` or is gone; the job still has to fail.
      if (!(transitionError instanceof DomainError)) throw transitionError;
      this.logger.warn(`Order ${job.orderId} not marked failed: ${transitionError.message}`);
    }

    return this.finish(job, 'failed', 'internal_error');
  }

  private async findOrder(orderId: number): Promise<Order | null> {
    try {
      return await this.ordersService.get(orderId);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private async finish(job: Job, status: JobStatus, result: string): Promise<JobStatus> {
    await this.jobsService.setStatus(job.id, status, result);
    return status;
  }
}
