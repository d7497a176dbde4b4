import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../common/errors';
import { Job } from './entities/job.entity';
import { JOB_STATUS_PREDECESSORS, JobStatus } from './job-status';

@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    @InjectRepository(Job)
    private readonly jobRepository: Repository<Job>,
  ) {}

  async create(orderId: number): Promise<Job> {
    const job = await this.jobRepository.save(
      this.jobRepository.create({
        id: uuidv4(),
        orderId,
        status: 'queued',
        result: null,
      }),
    );

    this.logger.log(`📥 Job ${job.id} queued for order ${orderId}`);
    return job;
  }

  async get(id: string): Promise<Job> {
    const job = await this.jobRepository.findOneBy({ id });
    if (!job) {
      throw new NotFoundError(`Job ${id} not found`, 'JOB_NOT_FOUND');
    }
    return job;
  }

  /** Oldest first */
  async findByStatus(status: JobStatus): Promise<Job[]> {
    return this.jobRepository.find({ where: { status }, order: { createdAt: 'ASC' } });
  }

  /**
   * Moves a job forward. The UPDATE only matches rows whose current status
   * may precede the requested one, so repeated or backward moves change
   * nothing and return false.
   */
  async setStatus(id: string, status: JobStatus, result: string | null = null): Promise<boolean> {
    const allowedFrom = JOB_STATUS_PREDECESSORS[status];
    if (allowedFrom.length === 0) {
      return false;
    }

    const update = await this.jobRepository.update(
      { id, status: In([...allowedFrom]) },
      { status, result },
    );

    if (!update.affected) {
      this.logger.warn(`⚠️ Job ${id} refused move to ${status}`);
      return false;
    }

    this.logger.log(`Job ${id} → ${status}${result ? ` (${result})` : ''}`);
    return true;
  }
}
