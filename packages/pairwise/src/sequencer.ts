import { existsSync } from 'node:fs';
import { sample, type Random } from '@pairwise/core';
import {
  traitPools,
  usableTraits,
  videoPath,
  type StimulusCatalog,
} from './catalog';
import type { ExperimentConfig } from './config';
import { buildPairs, highPosition } from './counterbalance';
import { applyOrdering } from './ordering';
import {
  createTrial,
  practiceId,
  type MainTrial,
  type PracticeTrial,
  type Trial,
} from './trial';
import { loadTrials, saveTrials } from './trial-store';

/**
 * Whether a break screen should come before the trial at `currentIndex`
 *
 * Never before the first or the last trial.
 *
 * @example
 *
 * ```ts
 * shouldTakeBreak(20, 100, 20); // true
 * shouldTakeBreak(0, 100, 20); // false
 * shouldTakeBreak(99, 100, 33); // false, last trial
 * ```
 */
export const shouldTakeBreak = (
  currentIndex: number,
  total: number,
  interval: number,
  enabled = true,
) =>
  enabled &&
  interval >= 1 &&
  currentIndex > 0 &&
  currentIndex < total - 1 &&
  currentIndex % interval === 0;

export type TrialSummary = {
  total_trials: number;
  trials_per_trait: Record<string, number>;
  high_left_count: number;
  high_right_count: number;
};

/**
 * Build and serve the trial sequence of one participant session
 *
 * The sequencer never moves {@link TrialSequencer.currentIndex} by itself, the
 * driver sets it, so a session can resume from any index.
 *
 * @example
 *
 * ```ts
 * const sequencer = new TrialSequencer(defineConfig());
 * sequencer.generateTrials(catalog, 'P001');
 * for (let i = 0; i < sequencer.total; i++) {
 *   sequencer.currentIndex = i;
 *   if (sequencer.shouldTakeBreak()) showBreak();
 *   run(sequencer.getTrial(i));
 * }
 * ```
 */
export class TrialSequencer {
  trials: readonly Trial[] = [];
  practiceTrials: readonly PracticeTrial[] = [];
  currentIndex = 0;
  readonly random: Random;
  constructor(
    public readonly config: ExperimentConfig,
    options: {
      /** Source of randomness for positions, shuffles and practice sampling */
      random?: Random;
    } = {},
  ) {
    this.random = options.random ?? Math.random;
  }
  /**
   * Build the main sequence: pairs per trait, counterbalanced positions, then
   * the spacing-constrained order when `randomizeTrialOrder` is set
   *
   * Configured traits missing from the catalog, or with an empty pool,
   * contribute no trials.
   */
  generateTrials(catalog: StimulusCatalog, participantId: string) {
    const { pairing, maxPairsPerTrait, positionPolicy } = this.config;
    let trials: MainTrial[] = [];

    for (const trait of usableTraits(catalog, this.config.traits)) {
      const pools = traitPools(catalog, trait);
      if (!pools) continue;
      const { high, low } = pools;
      for (const pair of buildPairs(high, low, pairing, maxPairsPerTrait)) {
        trials.push(
          createTrial({
            ...pair,
            trialId: trials.length + 1,
            trait,
            highPosition: highPosition(
              positionPolicy,
              participantId,
              trait,
              pair,
              this.random,
            ),
          }),
        );
      }
    }
    console.info(`Generated ${trials.length} trials total`);

    if (this.config.randomizeTrialOrder) {
      trials = applyOrdering(trials, this.config.minTraitSpacing, this.random);
      console.info(
        `Randomized trial order with min trait spacing of ${this.config.minTraitSpacing}`,
      );
    }

    this.currentIndex = 0;
    return (this.trials = trials);
  }
  /**
   * Build up to `count` practice trials, one per randomly chosen trait, from
   * the first HIGH and first LOW video of that trait
   *
   * Positions are random whatever the position policy.
   */
  generatePracticeTrials(
    catalog: StimulusCatalog,
    count = this.config.numPracticeTrials,
  ) {
    const traits = usableTraits(catalog, this.config.traits);
    const chosen = sample(traits, Math.min(count, traits.length), this.random);
    const practiceTrials = chosen.flatMap((trait, i) => {
      const pools = traitPools(catalog, trait);
      if (!pools) return [];
      return createTrial({
        trialId: practiceId(i + 1),
        trait,
        highVideo: pools.high[0],
        lowVideo: pools.low[0],
        highPosition: this.random() < 0.5 ? 'left' : 'right',
      });
    });
    if (!practiceTrials.length) console.warn('No practice trials available');
    return (this.practiceTrials = practiceTrials);
  }
  /** Trial at a 0-based index, `undefined` when out of range */
  getTrial(index: number): Trial | undefined {
    return Number.isInteger(index) ? this.trials[index] : undefined;
  }
  getCurrentTrial() {
    return this.getTrial(this.currentIndex);
  }
  /** Advance the index, then return the new current trial */
  nextTrial() {
    this.currentIndex++;
    return this.getCurrentTrial();
  }
  get total() {
    return this.trials.length;
  }
  /** 1-based number of the current trial and the total */
  getProgress(): [current: number, total: number] {
    return [this.currentIndex + 1, this.total];
  }
  /** {@link shouldTakeBreak} at the current index with the configured interval */
  shouldTakeBreak() {
    return shouldTakeBreak(
      this.currentIndex,
      this.total,
      this.config.trialsBetweenBreaks,
      this.config.enableBreaks,
    );
  }
  getSummary(): TrialSummary {
    const summary: TrialSummary = {
      total_trials: this.total,
      trials_per_trait: {},
      high_left_count: 0,
      high_right_count: 0,
    };
    for (const trial of this.trials) {
      summary.trials_per_trait[trial.trait] =
        (summary.trials_per_trait[trial.trait] ?? 0) + 1;
      trial.highPosition === 'left'
        ? summary.high_left_count++
        : summary.high_right_count++;
    }
    return summary;
  }
  /** Video files of the sequence that do not exist below `basePath` */
  validateStimuli(basePath = this.config.videoBasePath) {
    const missing = new Set<string>();
    for (const trial of [...this.practiceTrials, ...this.trials]) {
      for (const [level, video] of [
        ['high', trial.highVideo],
        ['low', trial.lowVideo],
      ] as const) {
        const filepath = videoPath(basePath, trial.trait, level, video);
        if (!existsSync(filepath)) missing.add(filepath);
      }
    }
    return { valid: missing.size === 0, missing: [...missing] };
  }
  /** Write the main sequence as a CSV snapshot */
  save(filepath: string) {
    saveTrials(filepath, this.trials);
  }
  /** Replace the main sequence with a snapshot, keeping practice trials apart */
  load(filepath: string) {
    const loaded = loadTrials(filepath);
    this.trials = loaded.filter((trial) => !trial.isPractice);
    this.currentIndex = 0;
    return this.trials;
  }
}
