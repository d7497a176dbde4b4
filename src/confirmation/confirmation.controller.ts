import { Controller, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { JobStatus } from '../jobs/job-status';
import { jobLocation } from '../jobs/job.presenter';
import { ConfirmationService } from './confirmation.service';

export interface ConfirmationAcceptedResponse {
  id: string;
  order_id: number;
  status: JobStatus;
}

@Controller('orders')
export class ConfirmationController {
  constructor(private readonly confirmationService: ConfirmationService) {}

  /**
   * 202 with the job's Location; the outcome is only visible by polling it.
   */
  @Post(':id/confirm')
  @HttpCode(HttpStatus.ACCEPTED)
  async confirmOrder(
    @Param('id', ParseIntPipe) id: number,
    @Res({ passthrough: true }) res: Response,
  ): Promise<ConfirmationAcceptedResponse> {
    const job = await this.confirmationService.confirm(id);
    res.setHeader('Location', jobLocation(job.id));
    return { id: job.id, order_id: job.orderId, status: job.status };
  }
}
