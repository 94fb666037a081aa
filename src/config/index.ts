import path from 'node:path';

export type PersistenceProvider = 'memory' | 'sqlite';
export type CacheProvider = 'memory' | 'redis';

export interface AppConfig {
  server: ServerConfig;
  persistence: PersistenceConfig;
  cache: CacheConfig;
  grading: GradingConfig;
  attempts: AttemptsConfig;
}

export interface ServerConfig {
  port: number;
  logLevel: string;
}

export interface PersistenceConfig {
  provider: PersistenceProvider;
  sqlite: SqliteConfig;
}

export interface SqliteConfig {
  dbRoot: string;
  filePattern: string;
  migrationsDir: string;
  seedDefaultTenant: boolean;
}

export interface CacheConfig {
  provider: CacheProvider;
  redisUrl: string;
  seedTtlBufferSeconds: number;
}

export interface GradingConfig {
  maxRetries: number;
  retryDelayMs: number;
  concurrency: number;
}

export interface AttemptsConfig {
  timeoutSweepIntervalMs: number;
}

function readIntFromEnv(envName: string): number | undefined {
  const raw = process.env[envName];
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readNonNegativeIntFromEnv(envName: string, defaultValue: number): number {
  const value = readIntFromEnv(envName);
  return value !== undefined && value >= 0 ? value : defaultValue;
}

function readProviderFromEnv(envName: string): PersistenceProvider {
  const raw = (process.env[envName] ?? 'sqlite').toLowerCase();
  if (raw === 'memory') return 'memory';
  return 'sqlite';
}

function readCacheProviderFromEnv(envName: string): CacheProvider {
  const raw = (process.env[envName] ?? 'memory').toLowerCase();
  if (raw === 'redis') return 'redis';
  return 'memory';
}

function readBooleanFromEnv(envName: string, defaultValue: boolean): boolean {
  const raw = process.env[envName];
  if (raw === undefined) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

export function loadConfig(): AppConfig {
  const port = readIntFromEnv('PORT') ?? 3000;
  const logLevel = process.env.LOG_LEVEL || 'info';
  const provider = readProviderFromEnv('DB_PROVIDER');
  const dbRoot = process.env.SQLITE_DB_ROOT || path.resolve(process.cwd(), 'data', 'sqlite');
  const filePattern = process.env.SQLITE_DB_FILE_PATTERN || '{tenantId}.db';
  const migrationsDir = process.env.SQLITE_MIGRATIONS_DIR || path.resolve(process.cwd(), 'migrations', 'sqlite');
  const seedDefaultTenant = readBooleanFromEnv('SQLITE_SEED_DEFAULT_TENANT', true);
  const cacheProvider = readCacheProviderFromEnv('CACHE_PROVIDER');
  const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379';
  const seedTtlBufferSeconds = readNonNegativeIntFromEnv('SEED_TTL_BUFFER_SECONDS', 3600);
  const maxRetries = readNonNegativeIntFromEnv('GRADING_MAX_RETRIES', 3);
  const retryDelayMs = readNonNegativeIntFromEnv('GRADING_RETRY_DELAY_MS', 500);
  const concurrency = Math.max(1, readNonNegativeIntFromEnv('GRADING_CONCURRENCY', 4));
  const timeoutSweepIntervalMs = readNonNegativeIntFromEnv('TIMEOUT_SWEEP_INTERVAL_MS', 30_000);

  return {
    server: { port, logLevel },
    persistence: {
      provider,
      sqlite: {
        dbRoot,
        filePattern,
        migrationsDir,
        seedDefaultTenant,
      },
    },
    cache: { provider: cacheProvider, redisUrl, seedTtlBufferSeconds },
    grading: { maxRetries, retryDelayMs, concurrency },
    attempts: { timeoutSweepIntervalMs },
  };
}
