import { ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { testDatabase } from '../../test/support/test-database';
import { orderInput } from '../../test/support/fixtures';
import { ConflictError, NotFoundError } from '../common/errors';
import { Job } from '../jobs/entities/job.entity';
import { JobsModule } from '../jobs/jobs.module';
import { OrdersModule } from '../orders/orders.module';
import { OrdersService } from '../orders/orders.service';
import { CONFIRMATION_QUEUE, ConfirmationJobData, ConfirmationQueue } from './confirmation-queue';
import { ConfirmationService } from './confirmation.service';

describe('ConfirmationService', () => {
  let moduleRef: TestingModule;
  let service: ConfirmationService;
  let orders: OrdersService;
  let jobRepository: Repository<Job>;
  const enqueue = jest.fn<Promise<void>, [ConfirmationJobData]>();

  beforeEach(async () => {
    enqueue.mockReset();
    enqueue.mockResolvedValue(undefined);

    moduleRef = await Test.createTestingModule({
      imports: [testDatabase(), OrdersModule, JobsModule],
      providers: [
        ConfirmationService,
        { provide: CONFIRMATION_QUEUE, useValue: { enqueue } satisfies ConfirmationQueue },
      ],
    }).compile();

    service = moduleRef.get(ConfirmationService);
    orders = moduleRef.get(OrdersService);
    jobRepository = moduleRef.get(getRepositoryToken(Job));
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('moves the order to confirming and queues one job', async () => {
    const order = await orders.create(orderInput());

    const job = await service.confirm(order.id);

    expect(job).toMatchObject({ orderId: order.id, status: 'queued' });
    expect((await orders.get(order.id)).state).toBe('confirming');
    expect(enqueue).toHaveBeenCalledWith({ jobId: job.id, orderId: order.id });
  });

  it('rejects a second confirmation without creating another job', async () => {
    const order = await orders.create(orderInput());
    await service.confirm(order.id);

    await expect(service.confirm(order.id)).rejects.toBeInstanceOf(ConflictError);

    expect(await jobRepository.countBy({ orderId: order.id })).toBe(1);
    expect(enqueue).toHaveBeenCalledTimes(1);
  });

  it('accepts only one of two simultaneous confirmations', async () => {
    const order = await orders.create(orderInput());

    const results = await Promise.allSettled([service.confirm(order.id), service.confirm(order.id)]);

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    expect(await jobRepository.countBy({ orderId: order.id })).toBe(1);
  });

  it('throws NotFoundError for unknown orders', async () => {
    await expect(service.confirm(31)).rejects.toBeInstanceOf(NotFoundError);
    expect(enqueue).not.toHaveBeenCalled();
  });

  it('puts the order back to pending when the queue is down', async () => {
    enqueue.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const order = await orders.create(orderInput());

    await expect(service.confirm(order.id)).rejects.toBeInstanceOf(ServiceUnavailableException);

    expect((await orders.get(order.id)).state).toBe('pending');
    const [failedJob] = await jobRepository.findBy({ orderId: order.id });
    expect(failedJob).toMatchObject({ status: 'failed', result: 'enqueue_failed' });

    const retried = await service.confirm(order.id);
    expect(retried.status).toBe('queued');
  });
});
