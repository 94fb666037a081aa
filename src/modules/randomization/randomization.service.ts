import type { SeedCache } from '../../infrastructure/cache/seed-cache.js';
import { createSilentLogger, type Logger } from '../../common/logger.js';
import { systemClock, type Clock } from '../../common/types.js';
import type { SanitizedContent, SanitizedQuestion } from '../questions/question.sanitizer.js';
import { cryptoRandomSource, deriveSeed, shuffleWithSeed, type RandomSource } from './seeded-shuffle.js';

export const SEED_TYPES = ['question_order', 'option_order'] as const;

export type SeedType = (typeof SEED_TYPES)[number];

export interface RandomizationSettings {
  randomizeQuestions: boolean;
  randomizeOptions: boolean;
}

export interface AttemptRef {
  tenantId: string;
  id: string;
}

export interface RandomizationServiceOptions {
  cache: SeedCache;
  logger?: Logger;
  clock?: Clock;
  randomSource?: RandomSource;
  /** Extra lifetime past the attempt duration so seeds outlive the deadline. */
  ttlBufferSeconds?: number;
}

export function seedKey(tenantId: string, attemptId: string, seedType: SeedType): string {
  return `attempt-seed:${tenantId}:${attemptId}:${seedType}`;
}

function enabledSeedTypes(settings: RandomizationSettings): SeedType[] {
  const types: SeedType[] = [];
  if (settings.randomizeQuestions) types.push('question_order');
  if (settings.randomizeOptions) types.push('option_order');
  return types;
}

/**
 * Deterministic per-attempt shuffling. Seeds are created once when an attempt
 * starts and read back on every view, so a student always sees the same order.
 * Cache trouble never fails the caller; it only turns shuffling off.
 */
export class RandomizationService {
  private readonly cache: SeedCache;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly randomSource: RandomSource;
  private readonly ttlBufferSeconds: number;

  constructor(options: RandomizationServiceOptions) {
    this.cache = options.cache;
    this.logger = options.logger ?? createSilentLogger();
    this.clock = options.clock ?? systemClock;
    this.randomSource = options.randomSource ?? cryptoRandomSource;
    this.ttlBufferSeconds = Math.max(1, options.ttlBufferSeconds ?? 3600);
  }

  ttlFor(lifetimeSeconds: number): number {
    return Math.max(0, Math.ceil(lifetimeSeconds)) + this.ttlBufferSeconds;
  }

  async generateSeeds(attempt: AttemptRef, settings: RandomizationSettings, lifetimeSeconds: number): Promise<void> {
    const ttl = this.ttlFor(lifetimeSeconds);
    for (const seedType of enabledSeedTypes(settings)) {
      const seed = this.nextSeed(attempt);
      try {
        await this.cache.set(seedKey(attempt.tenantId, attempt.id, seedType), String(seed), ttl, { onlyIfAbsent: true });
      } catch (err) {
        this.logger.warn({ err, attemptId: attempt.id, seedType }, 'Failed to store randomization seed');
      }
    }
  }

  async getSeed(attempt: AttemptRef, seedType: SeedType): Promise<number | undefined> {
    let raw: string | undefined;
    try {
      raw = await this.cache.get(seedKey(attempt.tenantId, attempt.id, seedType));
    } catch (err) {
      this.logger.warn({ err, attemptId: attempt.id, seedType }, 'Failed to read randomization seed');
      return undefined;
    }
    if (raw === undefined) {
      return undefined;
    }
    const seed = Number.parseInt(raw, 10);
    return Number.isFinite(seed) ? seed >>> 0 : undefined;
  }

  async refreshSeeds(attempt: AttemptRef, lifetimeSeconds: number): Promise<void> {
    const ttl = this.ttlFor(lifetimeSeconds);
    for (const seedType of SEED_TYPES) {
      try {
        await this.cache.expire(seedKey(attempt.tenantId, attempt.id, seedType), ttl);
      } catch (err) {
        this.logger.warn({ err, attemptId: attempt.id, seedType }, 'Failed to refresh randomization seed');
      }
    }
  }

  async clearSeeds(attempt: AttemptRef): Promise<void> {
    for (const seedType of SEED_TYPES) {
      try {
        await this.cache.delete(seedKey(attempt.tenantId, attempt.id, seedType));
      } catch (err) {
        this.logger.warn({ err, attemptId: attempt.id, seedType }, 'Failed to clear randomization seed');
      }
    }
  }

  /**
   * Applies the attempt's stored seeds to an ordered list of questions. A
   * missing seed leaves the corresponding order untouched.
   */
  async apply(attempt: AttemptRef, settings: RandomizationSettings, questions: SanitizedQuestion[]): Promise<SanitizedQuestion[]> {
    let result = questions;
    if (settings.randomizeQuestions) {
      const seed = await this.getSeed(attempt, 'question_order');
      if (seed !== undefined) {
        result = shuffleWithSeed(result, seed);
      }
    }
    if (settings.randomizeOptions) {
      const seed = await this.getSeed(attempt, 'option_order');
      if (seed !== undefined) {
        result = result.map(question => ({
          ...question,
          content: shuffleContentOptions(question.content, deriveSeed(seed, question.id)),
        }));
      }
    }
    return result;
  }

  private nextSeed(attempt: AttemptRef): number {
    try {
      return this.randomSource.nextSeed() >>> 0;
    } catch (err) {
      this.logger.warn({ err, attemptId: attempt.id }, 'Secure random source unavailable, seeding from clock (degraded)');
      return this.clock.now().getTime() >>> 0;
    }
  }
}

export function shuffleContentOptions(content: SanitizedContent, seed: number): SanitizedContent {
  switch (content.type) {
    case 'multiple_choice':
      return { ...content, options: shuffleWithSeed(content.options, seed) };
    case 'matching':
      return {
        ...content,
        leftItems: shuffleWithSeed(content.leftItems, seed),
        rightItems: shuffleWithSeed(content.rightItems, deriveSeed(seed, 'right')),
      };
    case 'ordering':
      return { ...content, items: shuffleWithSeed(content.items, seed) };
    default:
      return content;
  }
}
