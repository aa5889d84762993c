import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach } from 'vitest';

/** Fresh temporary folder per test, removed afterwards */
export const useTempDir = () => {
  const dirs: string[] = [];
  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });
  return () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'pairwise-'));
    dirs.push(dir);
    return dir;
  };
};

/** Length of the longest run of consecutive trials sharing a trait */
export const longestTraitRun = (trials: readonly { trait: string }[]) => {
  let longest = 0;
  let run = 0;
  trials.forEach((trial, i) => {
    run = i > 0 && trials[i - 1]?.trait === trial.trait ? run + 1 : 1;
    longest = Math.max(longest, run);
  });
  return longest;
};

/**
 * Smallest number of other trials between two trials of the same trait,
 * `Infinity` when no trait repeats
 */
export const minTraitGap = (trials: readonly { trait: string }[]) => {
  const last = new Map<string, number>();
  let gap = Infinity;
  trials.forEach(({ trait }, i) => {
    const prev = last.get(trait);
    if (prev !== undefined) gap = Math.min(gap, i - prev - 1);
    last.set(trait, i);
  });
  return gap;
};
