import { Logger } from '@nestjs/common';
import { BackgroundTask, TaskRunner } from '../interfaces';

export interface BackgroundTaskRunnerOptions {
  /**
   * Maximum number of tasks running at once
   */
  concurrency: number;
}

interface QueuedTask {
  name: string;
  task: BackgroundTask;
}

/**
 * Bounded in-process worker pool.
 *
 * Tasks never reject into the caller: a failing task is logged and the
 * worker slot is released. No deduplication happens here.
 */
export class BackgroundTaskRunner implements TaskRunner {
  private readonly logger = new Logger(BackgroundTaskRunner.name);
  private readonly concurrency: number;
  private running = 0;
  private queue: QueuedTask[] = [];
  private idleWaiters: Array<() => void> = [];
  private stats = { submitted: 0, succeeded: 0, failed: 0 };

  constructor(options: BackgroundTaskRunnerOptions = { concurrency: 4 }) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error('Runner concurrency must be a positive integer');
    }
    this.concurrency = options.concurrency;
  }

  submit(name: string, task: BackgroundTask): void {
    this.stats.submitted++;
    this.queue.push({ name, task });
    this.logger.debug(`Queued task ${name} (queue length ${this.queue.length})`);
    this.processQueue();
  }

  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getStats() {
    return {
      ...this.stats,
      running: this.running,
      queued: this.queue.length,
      concurrency: this.concurrency,
    };
  }

  private processQueue(): void {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }

      this.running++;
      // Deferred so submit() always returns before the task body starts
      Promise.resolve()
        .then(() => next.task())
        .then(
          () => {
            this.stats.succeeded++;
            this.release();
          },
          (error: unknown) => {
            this.stats.failed++;
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(
              `Background task ${next.name} failed: ${message}`,
              error instanceof Error ? error.stack : undefined,
            );
            this.release();
          },
        );
    }
  }

  private release(): void {
    this.running--;
    this.processQueue();

    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }
}
