import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { errorMessage } from '../utils/error-handling.util';
import { delay } from '../utils/timeout.util';

export type LedgerTaskStatus = 'succeeded' | 'failed' | 'dropped';

export interface LedgerTaskResult {
  id: number;
  label: string;
  status: LedgerTaskStatus;
  attempts: number;
  error?: string;
}

/**
 * Handle for a queued ledger write. `done` always resolves; it never rejects.
 */
export interface LedgerTask {
  id: number;
  label: string;
  done: Promise<LedgerTaskResult>;
}

export interface LedgerQueueStats {
  pending: number;
  succeeded: number;
  failed: number;
  dropped: number;
}

interface QueuedTask {
  id: number;
  label: string;
  run: () => Promise<unknown>;
  resolve: (result: LedgerTaskResult) => void;
}

/**
 * LedgerTaskQueueService
 *
 * Bounded queue for best-effort ledger transactions (session open/close).
 * Tasks run one at a time in submission order, so operator transactions
 * are never sent concurrently. Each gets `maxAttempts` tries with a linearly
 * growing delay; the outcome is reported through the task handle, the
 * settle listeners and {@link stats}.
 */
@Injectable()
export class LedgerTaskQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(LedgerTaskQueueService.name);
  private readonly queue: QueuedTask[] = [];
  private readonly listeners = new Set<(result: LedgerTaskResult) => void>();
  private readonly counters = { succeeded: 0, failed: 0, dropped: 0 };
  private draining: Promise<void> | null = null;
  private inFlight = 0;
  private stopped = false;
  private nextId = 1;

  constructor(@Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig) {}

  /**
   * Queues `run`. When the queue is full or shutting down the task is
   * reported as dropped without running.
   */
  enqueue(label: string, run: () => Promise<unknown>): LedgerTask {
    const id = this.nextId++;
    const done = new Promise<LedgerTaskResult>((resolve) => {
      if (this.stopped || this.queue.length >= this.config.ledgerWrites.maxPending) {
        this.logger.warn(`Dropping ledger task ${label}#${id}: queue ${this.stopped ? 'stopped' : 'full'}`);
        resolve(this.settle({ id, label, status: 'dropped', attempts: 0 }));
        return;
      }
      this.queue.push({ id, label, run, resolve });
    });

    if (!this.draining && this.queue.length > 0) {
      this.draining = this.drain();
    }
    return { id, label, done };
  }

  /** Registers a listener for every settled task. Returns an unsubscribe function. */
  onSettled(listener: (result: LedgerTaskResult) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Resolves once every queued task has settled. */
  idle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  stats(): LedgerQueueStats {
    return { pending: this.queue.length + this.inFlight, ...this.counters };
  }

  onModuleDestroy(): void {
    this.stopped = true;
    for (const task of this.queue.splice(0)) {
      task.resolve(this.settle({ id: task.id, label: task.label, status: 'dropped', attempts: 0 }));
    }
  }

  private async drain(): Promise<void> {
    let task = this.queue.shift();
    while (task) {
      this.inFlight = 1;
      task.resolve(await this.execute(task));
      this.inFlight = 0;
      task = this.stopped ? undefined : this.queue.shift();
    }
    this.draining = null;
  }

  private async execute(task: QueuedTask): Promise<LedgerTaskResult> {
    const { maxAttempts, retryDelayMs } = this.config.ledgerWrites;
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await task.run();
        this.logger.log(`Ledger task ${task.label}#${task.id} succeeded (attempt ${attempt})`);
        return this.settle({ id: task.id, label: task.label, status: 'succeeded', attempts: attempt });
      } catch (error) {
        lastError = errorMessage(error);
        this.logger.warn(`Ledger task ${task.label}#${task.id} attempt ${attempt}/${maxAttempts} failed: ${lastError}`);
        if (attempt < maxAttempts && !this.stopped) {
          await delay(retryDelayMs * attempt);
        }
      }
    }

    this.logger.error(`Ledger task ${task.label}#${task.id} failed after ${maxAttempts} attempts: ${lastError}`);
    return this.settle({
      id: task.id,
      label: task.label,
      status: 'failed',
      attempts: maxAttempts,
      error: lastError,
    });
  }

  private settle(result: LedgerTaskResult): LedgerTaskResult {
    this.counters[result.status]++;
    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (error) {
        this.logger.warn(`Ledger task listener failed: ${errorMessage(error)}`);
      }
    }
    return result;
  }
}
