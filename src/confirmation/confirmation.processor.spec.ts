import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { JobStatus } from '../jobs/job-status';
import { ConfirmationProcessor } from './confirmation.processor';
import { ConfirmationWorker } from './confirmation.worker';

describe('ConfirmationProcessor', () => {
  const run = jest.fn<Promise<JobStatus | null>, [string]>();

  async function createProcessor(config: Record<string, unknown> = {}): Promise<ConfirmationProcessor> {
    const moduleRef: TestingModule = await Test.createTestingModule({
      providers: [
        ConfirmationProcessor,
        { provide: ConfirmationWorker, useValue: { run } },
        { provide: ConfigService, useValue: new ConfigService(config) },
      ],
    }).compile();
    return moduleRef.get(ConfirmationProcessor);
  }

  beforeEach(() => {
    run.mockReset();
  });

  it('hands the job id to the confirmation worker', async () => {
    run.mockResolvedValue('succeeded');
    const processor = await createProcessor();

    await expect(processor.process({ data: { jobId: 'job-1', orderId: 3 } })).resolves.toBe('succeeded');

    expect(run).toHaveBeenCalledWith('job-1');
  });

  it('reports a job another run already took', async () => {
    run.mockResolvedValue(null);
    const processor = await createProcessor();

    await expect(processor.process({ data: { jobId: 'job-2', orderId: 4 } })).resolves.toBeNull();
  });

  it('reads its concurrency from configuration', async () => {
    expect((await createProcessor({ CONFIRMATION_CONCURRENCY: 8 })).concurrency).toBe(8);
    expect((await createProcessor()).concurrency).toBe(5);
  });
});
