import { Job } from './entities/job.entity';
import { JobStatus } from './job-status';

export interface JobResponse {
  id: string;
  order_id: number;
  status: JobStatus;
  result: string | null;
  created_at: string;
  updated_at: string;
}

export function jobLocation(id: string): string {
  return `/jobs/${id}`;
}

export function toJobResponse(job: Job): JobResponse {
  return {
    id: job.id,
    order_id: job.orderId,
    status: job.status,
    result: job.result,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
}
