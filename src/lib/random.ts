/**
 * Source of uniform floats in [0, 1). Generators take one of these instead of
 * reading Math.random so a run can be replayed from a seed.
 */
export type RandomSource = () => number;

export const systemRandom: RandomSource = () => Math.random();

// mulberry32
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pick<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list.");
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

/** Distinct elements, in draw order (partial Fisher-Yates). */
export function sample<T>(items: readonly T[], size: number, random: RandomSource): T[] {
  const pool = [...items];
  const take = Math.max(0, Math.min(size, pool.length));
  for (let i = 0; i < take; i += 1) {
    const j = i + Math.min(pool.length - 1 - i, Math.floor(random() * (pool.length - i)));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}

export function uniform(min: number, max: number, random: RandomSource) {
  return min + (max - min) * random();
}
