import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'node:timers/promises';
import { Order } from '../orders/entities/order.entity';

export const CONFIRMATION_POLICY = Symbol('CONFIRMATION_POLICY');

export interface ConfirmationDecision {
  approved: boolean;
  /** Stored on the job when the confirmation is rejected */
  reason?: string;
}

/**
 * The business decision behind a confirmation.
 * Throwing is treated as an internal failure of the job.
 */
export interface ConfirmationPolicy {
  decide(order: Order): Promise<ConfirmationDecision>;
}

/**
 * Approves every order after CONFIRMATION_DELAY_MS, standing in for the
 * external availability and payment checks.
 */
@Injectable()
export class ImmediateApprovalPolicy implements ConfirmationPolicy {
  private readonly delayMs: number;

  constructor(configService: ConfigService) {
    this.delayMs = configService.get<number>('CONFIRMATION_DELAY_MS', 250);
  }

  async decide(): Promise<ConfirmationDecision> {
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
    return { approved: true };
  }
}
