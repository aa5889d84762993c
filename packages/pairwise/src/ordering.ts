import { pick, shuffle, type Random } from '@pairwise/core';
import { renumber, type MainTrial } from './trial';

/** Group trials by trait, keeping the order in which traits first appear */
export const groupByTrait = <T extends { trait: string }>(trials: readonly T[]) => {
  const groups = new Map<string, T[]>();
  for (const trial of trials) {
    const group = groups.get(trial.trait);
    group ? group.push(trial) : groups.set(trial.trait, [trial]);
  }
  return groups;
};

/**
 * Shuffle trials while spacing out trials of the same trait
 *
 * Trials are shuffled within each trait, then traits are interleaved
 * greedily: each step picks a random trait among those with trials left that
 * do not appear in the last `minSpacing` positions. When every remaining
 * trait is too recent the constraint is dropped for that step, so skewed
 * trait counts can end with runs of the same trait. `minSpacing <= 0`
 * disables the constraint.
 *
 * Trials are re-issued with ids `1..N` in the final order.
 *
 * @example
 *
 * ```ts
 * const ordered = applyOrdering(trials, 2);
 * ordered[0].trialId; // 1
 * ```
 */
export const applyOrdering = (
  trials: readonly MainTrial[],
  minSpacing: number,
  random: Random = Math.random,
): MainTrial[] => {
  const queues = new Map(
    [...groupByTrait(trials)].map(([trait, group]): [string, MainTrial[]] => [
      trait,
      shuffle(group, random),
    ]),
  );
  const result: MainTrial[] = [];
  const recent: string[] = [];

  while (result.length < trials.length) {
    const remaining = [...queues].filter(([, queue]) => queue.length);
    const blocked = minSpacing > 0 ? new Set(recent.slice(-minSpacing)) : null;
    const allowed = blocked
      ? remaining.filter(([trait]) => !blocked.has(trait))
      : remaining;

    // relax the spacing when no trait qualifies
    const chosen = pick(allowed.length ? allowed : remaining, random);
    if (!chosen) break;
    const [trait, queue] = chosen;
    const trial = queue.shift();
    if (!trial) break;
    result.push(trial);
    recent.push(trait);
  }

  return result.map((trial, i) => renumber(trial, i + 1));
};
