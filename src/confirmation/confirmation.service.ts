import { Inject, Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { Job } from '../jobs/entities/job.entity';
import { JobsService } from '../jobs/jobs.service';
import { OrdersService } from '../orders/orders.service';
import { CONFIRMATION_QUEUE, ConfirmationQueue } from './confirmation-queue';

@Injectable()
export class ConfirmationService {
  private readonly logger = new Logger(ConfirmationService.name);

  constructor(
    private readonly ordersService: OrdersService,
    private readonly jobsService: JobsService,
    @Inject(CONFIRMATION_QUEUE) private readonly queue: ConfirmationQueue,
  ) {}

  /**
   * Accepts a confirmation request and returns the queued job.
   *
   * The pending → confirming swap is the only gate: whoever wins it owns the
   * single job of this order, every other caller gets a ConflictError.
   * If the job cannot be stored or queued, the order goes back to pending.
   */
  async confirm(orderId: number): Promise<Job> {
    await this.ordersService.transition(orderId, 'pending', 'confirming');

    let job: Job;
    try {
      job = await this.jobsService.create(orderId);
    } catch (error) {
      await this.revert(orderId);
      throw error;
    }

    try {
      await this.queue.enqueue({ jobId: job.id, orderId });
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`❌ Could not queue job ${job.id} for order ${orderId}: ${failure.message}`);

      await this.jobsService.setStatus(job.id, 'failed', 'enqueue_failed');
      await this.revert(orderId);
      throw new ServiceUnavailableException('Confirmation queue unavailable, retry later');
    }

    this.logger.log(`📬 Confirmation accepted | Order: ${orderId} | Job: ${job.id}`);
    return job;
  }

  private async revert(orderId: number): Promise<void> {
    await this.ordersService.transition(orderId, 'confirming', 'pending');
    this.logger.warn(`Order ${orderId} returned to pending`);
  }
}
