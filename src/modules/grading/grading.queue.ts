import { setImmediate as nextTurn, setTimeout as sleep } from 'node:timers/promises';
import { createSilentLogger, type Logger } from '../../common/logger.js';

export interface GradingJob {
  /** Short label used in logs, e.g. `auto-grade` or `finalize-manual`. */
  kind: string;
  tenantId: string;
  attemptId: string;
  run: () => unknown;
}

export interface GradingQueueOptions {
  logger?: Logger;
  maxRetries?: number;
  retryDelayMs?: number;
  concurrency?: number;
  wait?: (ms: number) => Promise<unknown>;
}

/**
 * In-process work queue for grading that happens after a request has already
 * answered. Jobs are retried with a linearly growing delay; a job that still
 * fails is logged and counted, never rethrown.
 */
export class GradingQueue {
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly concurrency: number;
  private readonly wait: (ms: number) => Promise<unknown>;
  private readonly pendingJobs: GradingJob[] = [];
  private active = 0;
  private failed = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: GradingQueueOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 500);
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.wait = options.wait ?? (ms => sleep(ms));
  }

  get failedCount(): number {
    return this.failed;
  }

  get size(): number {
    return this.pendingJobs.length + this.active;
  }

  enqueue(job: GradingJob): void {
    this.pendingJobs.push(job);
    this.pump();
  }

  /** Resolves once every queued and running job has settled. */
  onIdle(): Promise<void> {
    if (this.size === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump() {
    while (this.active < this.concurrency && this.pendingJobs.length > 0) {
      const job = this.pendingJobs.shift();
      if (!job) break;
      this.active += 1;
      void this.execute(job);
    }
  }

  private async execute(job: GradingJob): Promise<void> {
    try {
      // jobs never run inside the enqueueing call stack
      await nextTurn();
      await this.runWithRetries(job);
    } finally {
      this.active -= 1;
      this.pump();
      if (this.size === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach(resolve => resolve());
      }
    }
  }

  private async runWithRetries(job: GradingJob): Promise<void> {
    const context = { kind: job.kind, tenantId: job.tenantId, attemptId: job.attemptId };
    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      try {
        await job.run();
        return;
      } catch (err) {
        if (attempt < this.maxRetries) {
          this.logger.warn({ ...context, err, retry: attempt + 1 }, 'Grading job failed, retrying');
          await this.wait(this.retryDelayMs * (attempt + 1));
        } else {
          this.failed += 1;
          this.logger.error({ ...context, err, failedTotal: this.failed }, 'Grading job failed permanently');
        }
      }
    }
  }
}
