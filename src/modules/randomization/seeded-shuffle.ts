import { randomBytes } from 'node:crypto';

export interface RandomSource {
  /** Unsigned 32-bit integer. */
  nextSeed(): number;
}

export const cryptoRandomSource: RandomSource = {
  nextSeed: () => randomBytes(4).readUInt32BE(0),
};

/** mulberry32: small, fast PRNG with a 32-bit state. Returns floats in [0, 1). */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** 32-bit FNV-1a over the UTF-8 bytes of the value. */
export function fnv1a32(value: string): number {
  let hash = 0x811c9dc5;
  for (const byte of Buffer.from(value, 'utf8')) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

export function deriveSeed(baseSeed: number, discriminator: string): number {
  return (baseSeed + fnv1a32(discriminator)) >>> 0;
}

/** Fisher-Yates shuffle driven by a seeded generator. Returns a new array. */
export function shuffleWithSeed<T>(items: readonly T[], seed: number): T[] {
  const result = [...items];
  const next = mulberry32(seed);
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = Math.floor(next() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
