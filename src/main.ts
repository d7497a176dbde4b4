import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('RentalOrders');

  const app = configureApp(await NestFactory.create(AppModule));
  app.enableShutdownHooks();

  const config = app.get(ConfigService);
  const port = config.get<number>('PORT', 3000);
  await app.listen(port);

  logger.log(`🚀 Rental Orders Service running on port ${port}`);
  logger.log(`📬 Confirmation queue driver: ${config.get<string>('QUEUE_DRIVER', 'memory')}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('RentalOrders');
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
