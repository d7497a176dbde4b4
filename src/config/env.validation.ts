import { plainToInstance } from 'class-transformer';
import { IsBooleanString, IsIn, IsInt, IsString, Max, Min, validateSync } from 'class-validator';
import { QueueDriver } from '../confirmation/confirmation-queue';

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  DB_PATH: string = 'orders.db';

  @IsBooleanString()
  DB_SYNCHRONIZE: string = 'true';

  @IsIn(['memory', 'bullmq'])
  QUEUE_DRIVER: QueueDriver = 'memory';

  @IsString()
  REDIS_HOST: string = 'localhost';

  @IsInt()
  REDIS_PORT: number = 6379;

  @IsInt()
  @Min(1)
  CONFIRMATION_CONCURRENCY: number = 5;

  @IsInt()
  @Min(0)
  CONFIRMATION_DELAY_MS: number = 250;
}

/**
 * ConfigModule hook: converts numeric variables and fails fast on bad values.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return validated;
}
