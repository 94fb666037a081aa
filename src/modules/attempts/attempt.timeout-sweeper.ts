import { createSilentLogger, type Logger } from '../../common/logger.js';
import type { AttemptService } from './attempt.service.js';

export interface TimeoutSweeperOptions {
  intervalMs: number;
  logger?: Logger;
}

/**
 * Periodically closes attempts whose deadline passed while nobody was looking.
 * An interval of 0 leaves the sweeper idle.
 */
export class TimeoutSweeper {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<number> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly attempts: Pick<AttemptService, 'timeOutExpired'>,
    private readonly options: TimeoutSweeperOptions,
  ) {
    this.logger = options.logger ?? createSilentLogger();
  }

  start(): void {
    if (this.timer || this.options.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.runOnce().catch(err => {
        this.logger.error({ err }, 'Timeout sweep failed');
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  /** Runs a sweep now; joins the current one when a sweep is already underway. */
  runOnce(): Promise<number> {
    if (!this.running) {
      this.running = this.attempts
        .timeOutExpired()
        .then(closed => {
          if (closed > 0) {
            this.logger.info({ closed }, 'Timed out expired attempts');
          }
          return closed;
        })
        .finally(() => {
          this.running = null;
        });
    }
    return this.running;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running.catch(err => {
        this.logger.warn({ err }, 'Sweep in flight failed during shutdown');
      });
    }
  }
}
