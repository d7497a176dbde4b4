import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { Queue } from 'bullmq';
import { CONFIRMATION_QUEUE_NAME, ConfirmationJobData, ConfirmationQueue } from './confirmation-queue';

@Injectable()
export class BullConfirmationQueue implements ConfirmationQueue {
  private readonly logger = new Logger(BullConfirmationQueue.name);

  constructor(
    @InjectQueue(CONFIRMATION_QUEUE_NAME)
    private readonly queue: Queue<ConfirmationJobData>,
  ) {}

  async enqueue(data: ConfirmationJobData): Promise<void> {
    // Reusing our job id makes a repeated add a no-op in Redis.
    await this.queue.add('confirm-order', data, { jobId: data.jobId });
    this.logger.log(`📥 Queued confirmation | Job: ${data.jobId} | Order: ${data.orderId}`);
  }
}
