import { BullModule } from '@nestjs/bullmq';
import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JobsModule } from '../jobs/jobs.module';
import { OrdersModule } from '../orders/orders.module';
import { BullConfirmationQueue } from './bull-confirmation.queue';
import { CONFIRMATION_QUEUE, CONFIRMATION_QUEUE_NAME, QueueDriver } from './confirmation-queue';
import { ConfirmationController } from './confirmation.controller';
import { CONFIRMATION_POLICY, ImmediateApprovalPolicy } from './confirmation.policy';
import { ConfirmationProcessor } from './confirmation.processor';
import { ConfirmationService } from './confirmation.service';
import { ConfirmationWorker } from './confirmation.worker';
import { InProcessConfirmationQueue } from './in-process-confirmation.queue';

export interface ConfirmationModuleOptions {
  driver: QueueDriver;
}

@Module({})
export class ConfirmationModule {
  static forRoot(options: ConfirmationModuleOptions): DynamicModule {
    const providers: Provider[] = [
      ConfirmationService,
      ConfirmationWorker,
      { provide: CONFIRMATION_POLICY, useClass: ImmediateApprovalPolicy },
    ];

    if (options.driver === 'bullmq') {
      return {
        module: ConfirmationModule,
        imports: [
          OrdersModule,
          JobsModule,
          BullModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (config: ConfigService) => ({
              connection: {
                host: config.get<string>('REDIS_HOST', 'localhost'),
                port: config.get<number>('REDIS_PORT', 6379),
              },
            }),
          }),
          BullModule.registerQueue({
            name: CONFIRMATION_QUEUE_NAME,
            defaultJobOptions: {
              // Failures are recorded on our job, a retry would find it terminal.
              attempts: 1,
              removeOnComplete: 100,
              removeOnFail: 500,
            },
          }),
        ],
        controllers: [ConfirmationController],
        providers: [
          ...providers,
          ConfirmationProcessor,
          { provide: CONFIRMATION_QUEUE, useClass: BullConfirmationQueue },
        ],
        exports: [CONFIRMATION_QUEUE],
      };
    }

    return {
      module: ConfirmationModule,
      imports: [OrdersModule, JobsModule],
      controllers: [ConfirmationController],
      providers: [
        ...providers,
        InProcessConfirmationQueue,
        { provide: CONFIRMATION_QUEUE, useExisting: InProcessConfirmationQueue },
      ],
      exports: [CONFIRMATION_QUEUE, InProcessConfirmationQueue],
    };
  }
}
