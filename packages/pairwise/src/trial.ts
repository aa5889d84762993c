import type { Side } from '../types';

export type PracticeTrialId = `practice_${number}`;

type TrialFields = {
  readonly trait: string;
  readonly videoLeft: string;
  readonly videoRight: string;
  readonly highVideo: string;
  readonly lowVideo: string;
  readonly highPosition: Side;
};
export type MainTrial = TrialFields & {
  readonly trialId: number;
  readonly isPractice: false;
};
export type PracticeTrial = TrialFields & {
  readonly trialId: PracticeTrialId;
  readonly isPractice: true;
};
/** One comparison of a HIGH and a LOW video of the same trait */
export type Trial = MainTrial | PracticeTrial;
export type TrialId = Trial['trialId'];
export type TrialSequence = readonly Trial[];

export const isPracticeId = (value: string): value is PracticeTrialId =>
  /^practice_[1-9]\d*$/.test(value);

export const practiceId = (n: number): PracticeTrialId => `practice_${n}`;

/**
 * Create a frozen trial, placing the HIGH video on `highPosition`
 *
 * @example
 *
 * ```ts
 * const trial = createTrial({
 *   trialId: 1,
 *   trait: 'Openness',
 *   highVideo: 'h1.mp4',
 *   lowVideo: 'l1.mp4',
 *   highPosition: 'right',
 * });
 * trial.videoLeft; // 'l1.mp4'
 * ```
 */
export function createTrial(fields: {
  trialId: number;
  trait: string;
  highVideo: string;
  lowVideo: string;
  highPosition: Side;
}): MainTrial;
export function createTrial(fields: {
  trialId: PracticeTrialId;
  trait: string;
  highVideo: string;
  lowVideo: string;
  highPosition: Side;
}): PracticeTrial;
export function createTrial({
  trialId,
  trait,
  highVideo,
  lowVideo,
  highPosition,
}: {
  trialId: TrialId;
  trait: string;
  highVideo: string;
  lowVideo: string;
  highPosition: Side;
}): Trial {
  if (highVideo === lowVideo) {
    throw new Error(
      `Trial ${trialId} compares "${highVideo}" with itself for ${trait}`,
    );
  }
  const [videoLeft, videoRight] =
    highPosition === 'left' ? [highVideo, lowVideo] : [lowVideo, highVideo];
  const fields = {
    trait,
    videoLeft,
    videoRight,
    highVideo,
    lowVideo,
    highPosition,
  };
  if (typeof trialId === 'number') {
    if (!Number.isInteger(trialId) || trialId < 1) {
      throw new Error(`Trial id should be a positive integer, got ${trialId}`);
    }
    return Object.freeze({ trialId, isPractice: false as const, ...fields });
  }
  return Object.freeze({ trialId, isPractice: true as const, ...fields });
}

/** Copy of a main trial under a new id */
export const renumber = (trial: MainTrial, trialId: number) =>
  createTrial({ ...trial, trialId });

/** Whether the response picked the HIGH video */
export const choseHigh = (trial: Trial, response: string) =>
  response === trial.highPosition;
