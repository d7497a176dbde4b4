import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
  uptime: number;
  queueDriver: string;
}

@Controller()
export class HealthController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  root(): { message: string } {
    return { message: 'Rental Orders Service is running. See /health for status.' };
  }

  @Get('health')
  check(): HealthResponse {
    return {
      status: 'ok',
      service: 'rental-orders-service',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      queueDriver: this.configService.get<string>('QUEUE_DRIVER', 'memory'),
    };
  }
}
