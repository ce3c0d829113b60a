import { Test, TestingModule } from '@nestjs/testing';
import { GATEWAY_CONFIG } from '../src/config/environment.config';
import { LedgerTaskQueueService, LedgerTaskResult } from '../src/services/ledger-task-queue.service';
import { testConfig } from './helpers/test-config';

describe('LedgerTaskQueueService', () => {
  let queue: LedgerTaskQueueService;

  async function build(overrides: Record<string, string> = {}): Promise<void> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LedgerTaskQueueService,
        {
          provide: GATEWAY_CONFIG,
          useValue: testConfig({ LEDGER_WRITE_MAX_ATTEMPTS: '3', LEDGER_WRITE_RETRY_DELAY_MS: '1', ...overrides }),
        },
      ],
    }).compile();
    queue = module.get<LedgerTaskQueueService>(LedgerTaskQueueService);
  }

  beforeEach(async () => {
    await build();
  });

  it('should run a task and report success', async () => {
    const run = jest.fn().mockResolvedValue('0xhash');
    const task = queue.enqueue('openFreeSession', run);

    await expect(task.done).resolves.toEqual({ id: 1, label: 'openFreeSession', status: 'succeeded', attempts: 1 });
    expect(queue.stats()).toEqual({ pending: 0, succeeded: 1, failed: 0, dropped: 0 });
  });

  it('should retry a failing task until it succeeds', async () => {
    const run = jest
      .fn()
      .mockRejectedValueOnce(new Error('nonce too low'))
      .mockRejectedValueOnce(new Error('nonce too low'))
      .mockResolvedValue(undefined);

    const result = await queue.enqueue('closeSession', run).done;

    expect(result.status).toBe('succeeded');
    expect(result.attempts).toBe(3);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('should report a task that fails every attempt', async () => {
    const run = jest.fn().mockRejectedValue(new Error('execution reverted'));

    const result = await queue.enqueue('closeSession', run).done;

    expect(result).toEqual({
      id: 1,
      label: 'closeSession',
      status: 'failed',
      attempts: 3,
      error: 'execution reverted',
    });
    expect(queue.stats().failed).toBe(1);
  });

  it('should run tasks one at a time in submission order', async () => {
    const order: string[] = [];
    let active = 0;
    let maxActive = 0;
    const step = (name: string) => async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      order.push(name);
      active--;
    };

    queue.enqueue('a', step('a'));
    queue.enqueue('b', step('b'));
    queue.enqueue('c', step('c'));
    await queue.idle();

    expect(order).toEqual(['a', 'b', 'c']);
    expect(maxActive).toBe(1);
  });

  it('should drop tasks beyond the pending limit', async () => {
    await build({ LEDGER_WRITE_MAX_PENDING: '1' });
    let release: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => (release = resolve));

    const first = queue.enqueue('first', () => blocker);
    const second = queue.enqueue('second', async () => undefined);
    const third = queue.enqueue('third', async () => undefined);

    await expect(third.done).resolves.toMatchObject({ status: 'dropped', attempts: 0 });
    release();
    await expect(first.done).resolves.toMatchObject({ status: 'succeeded' });
    await expect(second.done).resolves.toMatchObject({ status: 'succeeded' });
    expect(queue.stats()).toEqual({ pending: 0, succeeded: 2, failed: 0, dropped: 1 });
  });

  it('should notify settle listeners until they unsubscribe', async () => {
    const seen: LedgerTaskResult[] = [];
    const unsubscribe = queue.onSettled((result) => seen.push(result));

    await queue.enqueue('one', async () => undefined).done;
    unsubscribe();
    await queue.enqueue('two', async () => undefined).done;

    expect(seen.map((result) => result.label)).toEqual(['one']);
  });

  it('should drop queued tasks on shutdown', async () => {
    let release: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => (release = resolve));
    const first = queue.enqueue('first', () => blocker);
    const second = queue.enqueue('second', async () => undefined);

    queue.onModuleDestroy();
    release();

    await expect(first.done).resolves.toMatchObject({ status: 'succeeded' });
    await expect(second.done).resolves.toMatchObject({ status: 'dropped' });
    await expect(queue.enqueue('late', async () => undefined).done).resolves.toMatchObject({ status: 'dropped' });
  });
});
