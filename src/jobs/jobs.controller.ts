import { Controller, Get, Param } from '@nestjs/common';
import { JobsService } from './jobs.service';
import { JobResponse, toJobResponse } from './job.presenter';

@Controller('jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  /**
   * Polling endpoint for confirmation jobs. Always 200 while the job exists.
   */
  @Get(':id')
  async getJob(@Param('id') id: string): Promise<JobResponse> {
    return toJobResponse(await this.jobsService.get(id));
  }
}
