import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutSweeper } from '../attempt.timeout-sweeper.js';
import { createHarness, DEMO_ASSESSMENT_ID, TENANT, recordingLogger, student } from '../../../__tests__/harness.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('TimeoutSweeper', () => {
  it('closes expired attempts on each tick', async () => {
    const h = createHarness();
    const attempt = await h.attempts.start(student(), DEMO_ASSESSMENT_ID);
    h.clock.advance(31 * 60_000);
    const sweeper = new TimeoutSweeper(h.attempts, { intervalMs: 1000, logger: h.logger });

    await expect(sweeper.runOnce()).resolves.toBe(1);
    await sweeper.stop();
    await h.queue.onIdle();

    expect(h.repositories.attempt.getById(TENANT, attempt.id)?.status).toBe('timed_out');
    expect(h.logger.info).toHaveBeenCalledWith({ closed: 1 }, 'Timed out expired attempts');
  });

  it('joins a sweep that is already running', async () => {
    let release: (value: number) => void = () => undefined;
    const timeOutExpired = vi.fn(() => new Promise<number>(resolve => (release = resolve)));
    const sweeper = new TimeoutSweeper({ timeOutExpired }, { intervalMs: 1000 });

    const first = sweeper.runOnce();
    const second = sweeper.runOnce();
    release(3);

    await expect(Promise.all([first, second])).resolves.toEqual([3, 3]);
    expect(timeOutExpired).toHaveBeenCalledTimes(1);
  });

  it('sweeps on an interval and logs failures', async () => {
    vi.useFakeTimers();
    const logger = recordingLogger();
    const timeOutExpired = vi.fn().mockRejectedValueOnce(new Error('locked')).mockResolvedValue(0);
    const sweeper = new TimeoutSweeper({ timeOutExpired }, { intervalMs: 1000, logger });

    sweeper.start();
    await vi.advanceTimersByTimeAsync(2500);
    await sweeper.stop();

    expect(timeOutExpired).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith({ err: new Error('locked') }, 'Timeout sweep failed');
  });

  it('stays idle when the interval is zero', async () => {
    vi.useFakeTimers();
    const timeOutExpired = vi.fn().mockResolvedValue(0);
    const sweeper = new TimeoutSweeper({ timeOutExpired }, { intervalMs: 0 });

    sweeper.start();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(timeOutExpired).not.toHaveBeenCalled();
  });
});
