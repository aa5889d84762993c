import { createRandom, fnv1a, type Random } from '@pairwise/core';
import type { Side } from '../types';

export type Pair = { highVideo: string; lowVideo: string };
export type PairingMode = 'full' | 'bounded';
export type PositionPolicy = 'deterministic' | 'randomized';

/**
 * Every HIGH video paired with every LOW video, HIGH-major
 *
 * @example
 *
 * ```ts
 * fullFactorial(['h1', 'h2'], ['l1']);
 * // [{ highVideo: 'h1', lowVideo: 'l1' }, { highVideo: 'h2', lowVideo: 'l1' }]
 * ```
 */
export const fullFactorial = (
  highs: readonly string[],
  lows: readonly string[],
): Pair[] =>
  highs.flatMap((highVideo) => lows.map((lowVideo) => ({ highVideo, lowVideo })));

/**
 * At most `limit` distinct pairs, walking the longer list in order while
 * cycling through the shorter one
 *
 * Round `r` pairs item `j` of the longer list with item `(j + r) % n` of the
 * shorter one, so the first `H×L` pairs visit the full factorial once.
 */
export const boundedPairs = (
  highs: readonly string[],
  lows: readonly string[],
  limit: number,
): Pair[] => {
  const total = Math.min(Math.max(limit, 0), highs.length * lows.length);
  const longer = Math.max(highs.length, lows.length);
  const pairs: Pair[] = [];
  for (let k = 0; k < total; k++) {
    const round = Math.floor(k / longer);
    const j = k % longer;
    if (highs.length >= lows.length) {
      pairs.push({
        highVideo: highs[j],
        lowVideo: lows[(j + round) % lows.length],
      });
    } else {
      pairs.push({
        highVideo: highs[(j + round) % highs.length],
        lowVideo: lows[j],
      });
    }
  }
  return pairs;
};

export const buildPairs = (
  highs: readonly string[],
  lows: readonly string[],
  mode: PairingMode,
  limit: number,
) =>
  mode === 'full' ? fullFactorial(highs, lows) : boundedPairs(highs, lows, limit);

/** Version of {@link positionSeed}, bump when the derivation changes */
export const POSITION_SEED_VERSION = 1;

/**
 * Seed of the left/right layout of one pair for one participant
 *
 * v1: FNV-1a (32-bit) of `${participantId}_${trait}_${highVideo}_${lowVideo}`.
 */
export const positionSeed = (
  participantId: string,
  trait: string,
  { highVideo, lowVideo }: Pair,
) => fnv1a(`${participantId}_${trait}_${highVideo}_${lowVideo}`);

/**
 * Side of the HIGH video
 *
 * `deterministic` draws once from a mulberry32 generator seeded with
 * {@link positionSeed}, so reruns for the same participant reproduce the
 * layout. `randomized` draws from `random` and ignores the participant.
 */
export const highPosition = (
  policy: PositionPolicy,
  participantId: string,
  trait: string,
  pair: Pair,
  random: Random = Math.random,
): Side => {
  const draw =
    policy === 'deterministic'
      ? createRandom(positionSeed(participantId, trait, pair))()
      : random();
  return draw < 0.5 ? 'left' : 'right';
};
