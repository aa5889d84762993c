import { createRandom } from '@pairwise/core';
import { describe, expect, it } from 'vitest';
import { applyOrdering, groupByTrait } from '../src/ordering';
import { createTrial, type MainTrial } from '../src/trial';
import { longestTraitRun, minTraitGap } from './helpers';

const makeTrials = (counts: Record<string, number>) => {
  const trials: MainTrial[] = [];
  for (const [trait, count] of Object.entries(counts)) {
    for (let i = 1; i <= count; i++) {
      trials.push(
        createTrial({
          trialId: trials.length + 1,
          trait,
          highVideo: `${trait}_h${i}.mp4`,
          lowVideo: `${trait}_l${i}.mp4`,
          highPosition: i % 2 ? 'left' : 'right',
        }),
      );
    }
  }
  return trials;
};
const contentOf = (trials: readonly MainTrial[]) =>
  trials
    .map((t) => `${t.trait}:${t.highVideo}:${t.lowVideo}:${t.highPosition}`)
    .sort();

describe('applyOrdering', () => {
  it('should keep every trial exactly once', () => {
    const trials = makeTrials({ A: 4, B: 3, C: 2 });
    const ordered = applyOrdering(trials, 2, createRandom(1));
    expect(contentOf(ordered)).toEqual(contentOf(trials));
  });

  it('should renumber trials 1..N in the new order', () => {
    const ordered = applyOrdering(makeTrials({ A: 3, B: 3 }), 1, createRandom(2));
    expect(ordered.map((t) => t.trialId)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should space out traits when counts allow it', () => {
    for (let seed = 0; seed < 20; seed++) {
      const ordered = applyOrdering(
        makeTrials({ A: 4, B: 4, C: 4 }),
        2,
        createRandom(seed),
      );
      expect(minTraitGap(ordered)).toBe(2);
      expect(longestTraitRun(ordered)).toBe(1);
    }
  });

  it('should relax the spacing when no trait qualifies', () => {
    const ordered = applyOrdering(makeTrials({ A: 3, B: 1 }), 1, () => 0);
    expect(ordered.map((t) => t.trait)).toEqual(['A', 'B', 'A', 'A']);
    expect(longestTraitRun(ordered)).toBe(2);
  });

  it('should disable the constraint for a spacing of 0', () => {
    const ordered = applyOrdering(makeTrials({ A: 2, B: 1 }), 0, () => 0);
    expect(ordered.map((t) => t.trait)).toEqual(['A', 'A', 'B']);
  });

  it('should replay the same order for the same seed', () => {
    const trials = makeTrials({ A: 5, B: 5, C: 5 });
    expect(applyOrdering(trials, 2, createRandom(9))).toEqual(
      applyOrdering(trials, 2, createRandom(9)),
    );
  });

  it('should return an empty order for no trials', () => {
    expect(applyOrdering([], 2)).toEqual([]);
  });
});

describe('groupByTrait', () => {
  it('should keep the order in which traits first appear', () => {
    const groups = groupByTrait([
      { trait: 'B', n: 1 },
      { trait: 'A', n: 2 },
      { trait: 'B', n: 3 },
    ]);
    expect([...groups.keys()]).toEqual(['B', 'A']);
    expect(groups.get('B')?.map((t) => t.n)).toEqual([1, 3]);
  });
});
