import { randomInt } from 'node:crypto';

import { MAX_SEED } from '../schema/plan.js';

// ── Seeded PRNG ──────────────────────────────────────────────
// mulberry32: small, fast, and identical on every platform for a given seed.

export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function generateSeed(): number {
  return randomInt(0, MAX_SEED);
}

/** Seeded draw without replacement. The same seed always yields the same order. */
export function shuffle<T>(items: readonly T[], seed: number): T[] {
  const next = createRng(seed);
  const pool = [...items];
  const result: T[] = [];
  while (pool.length > 0) {
    const index = Math.floor(next() * pool.length);
    result.push(...pool.splice(index, 1));
  }
  return result;
}
