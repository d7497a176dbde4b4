export const CONFIRMATION_QUEUE = Symbol('CONFIRMATION_QUEUE');

/** BullMQ queue name, also used as the processor binding */
export const CONFIRMATION_QUEUE_NAME = 'order-confirmation';

export type QueueDriver = 'memory' | 'bullmq';

export interface ConfirmationJobData {
  jobId: string;
  orderId: number;
}

/**
 * Hands a queued job to whatever runs ConfirmationWorker.
 * Resolves once the job is accepted, never waits for the worker.
 */
export interface ConfirmationQueue {
  enqueue(data: ConfirmationJobData): Promise<void>;
}
