import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfirmationModule } from './confirmation/confirmation.module';
import { validateEnvironment } from './config/env.validation';
import { HealthController } from './health/health.controller';
import { Job } from './jobs/entities/job.entity';
import { JobsModule } from './jobs/jobs.module';
import { Order } from './orders/entities/order.entity';
import { OrderLog } from './orders/entities/order-log.entity';
import { OrdersModule } from './orders/orders.module';

@Module({
  imports: [
    // Loads .env into process.env before QUEUE_DRIVER is read below.
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'sqlite',
        database: config.get<string>('DB_PATH', 'orders.db'),
        entities: [Order, OrderLog, Job],
        synchronize: config.get<string>('DB_SYNCHRONIZE', 'true') === 'true',
      }),
    }),
    OrdersModule,
    JobsModule,
    ConfirmationModule.forRoot({
      driver: process.env.QUEUE_DRIVER === 'bullmq' ? 'bullmq' : 'memory',
    }),
  ],
  controllers: [HealthController],
})
export class AppModule {}
