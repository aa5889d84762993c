import type { Random } from '../types';

/**
 * 32-bit FNV-1a hash over the UTF-16 code units of a string
 *
 * @see {@link http://www.isthe.com/chongo/tech/comp/fnv/ | FNV hash}
 */
export const fnv1a = (input: string) => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

/**
 * Seeded pseudo-random generator (mulberry32)
 *
 * The same seed always yields the same sequence, whatever the platform.
 *
 * @example
 *
 * ```ts
 * const random = createRandom(42);
 * random(); // same value on every run
 * ```
 */
export const createRandom = (seed: number): Random => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/** Random integer in `[0, length)` */
export const randomIndex = (length: number, random: Random = Math.random) =>
  Math.min(length - 1, Math.floor(random() * length));

/** Shuffled copy of `items` (Fisher–Yates) */
export const shuffle = <T>(items: readonly T[], random: Random = Math.random) => {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
};

/** Pick one item uniformly, `undefined` for an empty list */
export const pick = <T>(items: readonly T[], random: Random = Math.random) =>
  items.length ? items[randomIndex(items.length, random)] : undefined;

/**
 * Sample distinct items without replacement, keeping the order in which they
 * were drawn
 *
 * @example
 *
 * ```ts
 * sample(['a', 'b', 'c'], 2); // e.g. ['c', 'a']
 * sample(['a', 'b', 'c'], 5); // warns, returns all 3 in random order
 * ```
 */
export const sample = <T>(
  candidates: readonly T[],
  size: number,
  random: Random = Math.random,
) => {
  const pool = [...candidates];
  if (size > pool.length) {
    console.warn(`Sample size should be <= ${pool.length} without replacement`);
    size = pool.length;
  }
  const result: T[] = [];
  while (pool.length && size-- > 0) {
    result.push(...pool.splice(randomIndex(pool.length, random), 1));
  }
  return result;
};
