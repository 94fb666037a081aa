import { pino, type BaseLogger } from 'pino';

/**
 * Logging surface the services depend on. Both a standalone pino logger and
 * Fastify's request/app loggers satisfy it.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface LoggerOptions {
  level?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: options.name ?? 'attempt-grading', level: options.level ?? 'info' });
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
