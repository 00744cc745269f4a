/** Uniform source in [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** mulberry32: small, fast, and good enough for simulated evidence. */
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

export const uniform = (random: RandomSource, min: number, max: number): number =>
  min + (max - min) * random();

/** Inclusive on both ends. */
export const randomInt = (random: RandomSource, min: number, max: number): number =>
  Math.min(max, min + Math.floor(random() * (max - min + 1)));

export function choice<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot choose from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/** Picks `count` distinct items (partial Fisher-Yates over a copy). */
export function sample<T>(random: RandomSource, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const take = Math.max(0, Math.min(count, pool.length));
  for (let i = 0; i < take; i++) {
    const j = i + Math.min(pool.length - i - 1, Math.floor(random() * (pool.length - i)));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
