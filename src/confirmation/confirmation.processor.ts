import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Job as BullJob } from 'bullmq';
import { JobStatus } from '../jobs/job-status';
import { CONFIRMATION_QUEUE_NAME, ConfirmationJobData } from './confirmation-queue';
import { ConfirmationWorker } from './confirmation.worker';

/**
 * BullMQ consumer of the confirmation queue.
 * ConfirmationWorker records failures itself, so BullMQ only sees a failed
 * job when the database is unreachable.
 */
@Processor(CONFIRMATION_QUEUE_NAME)
export class ConfirmationProcessor extends WorkerHost implements OnApplicationBootstrap {
  private readonly logger = new Logger(ConfirmationProcessor.name);
  readonly concurrency: number;

  constructor(
    private readonly confirmationWorker: ConfirmationWorker,
    configService: ConfigService,
  ) {
    super();
    this.concurrency = configService.get<number>('CONFIRMATION_CONCURRENCY', 5);
  }

  // The BullMQ worker exists only after module init, and .env is loaded by then.
  onApplicationBootstrap() {
    this.worker.concurrency = this.concurrency;
    this.logger.log(`⚙️ Confirmation worker concurrency: ${this.concurrency}`);
  }

  async process(job: Pick<BullJob<ConfirmationJobData>, 'data'>): Promise<JobStatus | null> {
    return this.confirmationWorker.run(job.data.jobId);
  }

  @OnWorkerEvent('completed')
  onCompleted(job: BullJob<ConfirmationJobData>) {
    this.logger.log(`✅ Queue job completed | Job: ${job.data.jobId} | Order: ${job.data.orderId}`);
  }

  @OnWorkerEvent('failed')
  onFailed(job: BullJob<ConfirmationJobData> | undefined, error: Error) {
    this.logger.error(
      `❌ Queue job failed | Job: ${job?.data.jobId ?? 'unknown'} | Error: ${error.message}`,
      error.stack,
    );
  }

  @OnWorkerEvent('stalled')
  onStalled(jobId: string) {
    this.logger.warn(`⚠️ Queue job stalled | ID: ${jobId}`);
  }
}
