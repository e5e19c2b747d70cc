import { Logger } from '@nestjs/common';
import { createJsonLogEntry } from '@resumable-upload/shared';
import type {
  BackgroundTask,
  TaskAdmission,
  UploadJobExecutorPort,
} from '../../application/uploads/ports/upload-job-executor.port';

export interface BoundedWorkerPoolOptions {
  coreWorkers: number;
  maxWorkers: number;
  queueCapacity: number;
}

export type WorkerPoolStats = {
  activeWorkers: number;
  queuedTasks: number;
  callerRunning: number;
};

/**
 * Runs background tasks on at most `maxWorkers` concurrent workers.
 *
 * Admission order: a new worker while fewer than `coreWorkers` are busy, then
 * the bounded queue, then an extra worker up to `maxWorkers`. When all three
 * are exhausted the task runs on the submitting caller, whose `submit` call
 * only resolves once the task has finished.
 */
export class BoundedWorkerPool implements UploadJobExecutorPort {
  private readonly logger = new Logger(BoundedWorkerPool.name);
  private readonly queue: BackgroundTask[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private activeWorkers = 0;
  private callerRunning = 0;

  constructor(private readonly options: BoundedWorkerPoolOptions) {
    if (options.coreWorkers < 1 || options.maxWorkers < options.coreWorkers || options.queueCapacity < 0) {
      throw new Error(
        `Invalid worker pool bounds: core=${options.coreWorkers} max=${options.maxWorkers} queue=${options.queueCapacity}.`,
      );
    }
  }

  async submit(task: BackgroundTask): Promise<TaskAdmission> {
    if (this.activeWorkers < this.options.coreWorkers) {
      this.startWorker(task);
      return 'started';
    }

    if (this.queue.length < this.options.queueCapacity) {
      this.queue.push(task);
      return 'queued';
    }

    if (this.activeWorkers < this.options.maxWorkers) {
      this.startWorker(task);
      return 'started';
    }

    this.logger.warn(
      JSON.stringify(
        createJsonLogEntry({
          level: 'warn',
          service: 'upload-api',
          message: 'Worker pool saturated; running task on the submitting caller',
          correlationId: 'system',
          metadata: this.stats(),
        }),
      ),
    );

    this.callerRunning += 1;
    try {
      await this.runSafely(task);
    } finally {
      this.callerRunning -= 1;
      this.notifyIfIdle();
    }
    return 'caller-ran';
  }

  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  stats(): WorkerPoolStats {
    return {
      activeWorkers: this.activeWorkers,
      queuedTasks: this.queue.length,
      callerRunning: this.callerRunning,
    };
  }

  private startWorker(firstTask: BackgroundTask): void {
    this.activeWorkers += 1;
    this.drain(firstTask).catch((error: unknown) => {
      this.logError('Worker loop crashed', error);
    });
  }

  private async drain(firstTask: BackgroundTask): Promise<void> {
    let next: BackgroundTask | undefined = firstTask;
    try {
      while (next) {
        await this.runSafely(next);
        next = this.queue.shift();
      }
    } finally {
      this.activeWorkers -= 1;
      this.notifyIfIdle();
    }
  }

  private async runSafely(task: BackgroundTask): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.logError('Background task failed', error);
    }
  }

  private isIdle(): boolean {
    return this.activeWorkers === 0 && this.queue.length === 0 && this.callerRunning === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
    for (const resolve of waiters) {
      resolve();
    }
  }

  private logError(message: string, error: unknown): void {
    this.logger.error(
      JSON.stringify(
        createJsonLogEntry({
          level: 'error',
          service: 'upload-api',
          message,
          correlationId: 'system',
          metadata: this.stats(),
          error,
        }),
      ),
    );
  }
}
