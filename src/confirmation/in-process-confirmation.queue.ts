import { Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { JobsService } from '../jobs/jobs.service';
import { ConfirmationJobData, ConfirmationQueue } from './confirmation-queue';
import { ConfirmationWorker } from './confirmation.worker';

/**
 * Runs confirmations in this process, on a later turn of the event loop.
 * In-flight runs are awaited before the module (and the database) goes away.
 * Jobs still queued when a previous process stopped are picked up again on startup.
 */
@Injectable()
export class InProcessConfirmationQueue
  implements ConfirmationQueue, OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(InProcessConfirmationQueue.name);
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly worker: ConfirmationWorker,
    private readonly jobsService: JobsService,
  ) {}

  async enqueue(data: ConfirmationJobData): Promise<void> {
    const run: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.worker.run(data.jobId))
      .then((status) => {
        this.logger.debug(`Job ${data.jobId} finished with ${status ?? 'no-op'}`);
      })
      .catch((error: unknown) => {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`❌ Worker crashed on job ${data.jobId}: ${failure.message}`, failure.stack);
      })
      .finally(() => {
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
  }

  /** Resolves once every accepted job has run, including ones added meanwhile. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  async onApplicationBootstrap(): Promise<void> {
    const leftover = await this.jobsService.findByStatus('queued');
    if (leftover.length === 0) {
      return;
    }

    this.logger.log(`🔁 Re-queuing ${leftover.length} confirmation(s) left queued`);
    for (const job of leftover) {
      await this.enqueue({ jobId: job.id, orderId: job.orderId });
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} confirmation(s) to finish`);
    }
    await this.drain();
  }
}
