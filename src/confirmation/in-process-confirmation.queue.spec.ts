import { Test, TestingModule } from '@nestjs/testing';
import { testDatabase } from '../../test/support/test-database';
import { orderInput } from '../../test/support/fixtures';
import { JobsModule } from '../jobs/jobs.module';
import { JobsService } from '../jobs/jobs.service';
import { OrdersModule } from '../orders/orders.module';
import { OrdersService } from '../orders/orders.service';
import { CONFIRMATION_POLICY, ConfirmationDecision, ConfirmationPolicy } from './confirmation.policy';
import { ConfirmationWorker } from './confirmation.worker';
import { InProcessConfirmationQueue } from './in-process-confirmation.queue';

describe('InProcessConfirmationQueue', () => {
  let moduleRef: TestingModule;
  let queue: InProcessConfirmationQueue;
  let orders: OrdersService;
  let jobs: JobsService;
  const decide = jest.fn<Promise<ConfirmationDecision>, Parameters<ConfirmationPolicy['decide']>>();

  beforeEach(async () => {
    decide.mockReset();
    decide.mockResolvedValue({ approved: true });

    moduleRef = await Test.createTestingModule({
      imports: [testDatabase(), OrdersModule, JobsModule],
      providers: [
        ConfirmationWorker,
        InProcessConfirmationQueue,
        { provide: CONFIRMATION_POLICY, useValue: { decide } satisfies ConfirmationPolicy },
      ],
    }).compile();

    queue = moduleRef.get(InProcessConfirmationQueue);
    orders = moduleRef.get(OrdersService);
    jobs = moduleRef.get(JobsService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  async function confirmingOrderWithJob() {
    const order = await orders.create(orderInput());
    await orders.transition(order.id, 'pending', 'confirming');
    const job = await jobs.create(order.id);
    return { order, job };
  }

  it('runs an enqueued job in the background', async () => {
    const { order, job } = await confirmingOrderWithJob();

    await queue.enqueue({ jobId: job.id, orderId: order.id });
    expect(decide).not.toHaveBeenCalled();

    await queue.drain();

    expect((await jobs.get(job.id)).status).toBe('succeeded');
    expect((await orders.get(order.id)).state).toBe('confirmed');
  });

  it('picks up jobs left queued by a previous run on startup', async () => {
    const { order, job } = await confirmingOrderWithJob();

    await queue.onApplicationBootstrap();
    await queue.drain();

    expect(await jobs.get(job.id)).toMatchObject({ status: 'succeeded', result: `/orders/${order.id}` });
    expect((await orders.get(order.id)).state).toBe('confirmed');
  });

  it('leaves finished jobs alone on startup', async () => {
    const { job } = await confirmingOrderWithJob();
    await jobs.setStatus(job.id, 'failed', 'enqueue_failed');

    await queue.onApplicationBootstrap();
    await queue.drain();

    expect(decide).not.toHaveBeenCalled();
    expect((await jobs.get(job.id)).status).toBe('failed');
  });
});
