export const JOB_STATUSES = ['queued', 'running', 'succeeded', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/**
 * States a job may be in right before moving to the key.
 * queued → failed covers jobs that could never be handed to a worker.
 */
export const JOB_STATUS_PREDECESSORS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  queued: [],
  running: ['queued'],
  succeeded: ['running'],
  failed: ['queued', 'running'],
};

