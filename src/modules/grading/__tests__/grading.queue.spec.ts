import { describe, expect, it, vi } from 'vitest';
import { GradingQueue } from '../grading.queue.js';
import { recordingLogger } from '../../../__tests__/harness.js';

const noWait = async () => undefined;

describe('GradingQueue', () => {
  it('runs jobs after the enqueueing call returns', async () => {
    const queue = new GradingQueue({ wait: noWait });
    const run = vi.fn();

    queue.enqueue({ kind: 'auto-grade', tenantId: 'tenant-1', attemptId: 'attempt-1', run });
    expect(run).not.toHaveBeenCalled();
    expect(queue.size).toBe(1);

    await queue.onIdle();
    expect(run).toHaveBeenCalledTimes(1);
    expect(queue.size).toBe(0);
  });

  it('resolves onIdle immediately when nothing is queued', async () => {
    await expect(new GradingQueue().onIdle()).resolves.toBeUndefined();
  });

  it('retries failing jobs with a growing delay', async () => {
    const logger = recordingLogger();
    const wait = vi.fn(noWait);
    const queue = new GradingQueue({ logger, wait, maxRetries: 2, retryDelayMs: 100 });
    const run = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue(undefined);

    queue.enqueue({ kind: 'auto-grade', tenantId: 'tenant-1', attemptId: 'attempt-1', run });
    await queue.onIdle();

    expect(run).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[100], [200]]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(queue.failedCount).toBe(0);
  });

  it('counts and logs jobs that keep failing', async () => {
    const logger = recordingLogger();
    const queue = new GradingQueue({ logger, wait: noWait, maxRetries: 1, retryDelayMs: 10 });
    const failure = new Error('storage unavailable');
    const run = vi.fn(() => {
      throw failure;
    });

    queue.enqueue({ kind: 'auto-grade', tenantId: 'tenant-1', attemptId: 'attempt-9', run });
    await queue.onIdle();

    expect(run).toHaveBeenCalledTimes(2);
    expect(queue.failedCount).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      { kind: 'auto-grade', tenantId: 'tenant-1', attemptId: 'attempt-9', err: failure, failedTotal: 1 },
      'Grading job failed permanently',
    );
  });

  it('never runs more jobs at once than its concurrency', async () => {
    const queue = new GradingQueue({ concurrency: 2, wait: noWait });
    let running = 0;
    let peak = 0;
    const run = async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 5));
      running -= 1;
    };

    for (let i = 0; i < 5; i += 1) {
      queue.enqueue({ kind: 'auto-grade', tenantId: 'tenant-1', attemptId: `attempt-${i}`, run });
    }
    await queue.onIdle();

    expect(peak).toBe(2);
    expect(running).toBe(0);
  });
});
