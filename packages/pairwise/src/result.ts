import type { Response } from '../types';
import { choseHigh, type Trial } from './trial';

/** Canonical, ordered columns of the results file */
export const RESULT_COLUMNS = [
  'participant_id',
  'session',
  'trial_id',
  'trait',
  'video_left',
  'video_right',
  // side of the HIGH video
  'high_position',
  'response',
  // whether the HIGH video was chosen
  'response_correct',
  'response_time',
  'confidence_rating',
  'trial_start_time',
  'video_onset_time',
  'video_offset_time',
  'response_time_absolute',
] as const;
export type ResultColumn = (typeof RESULT_COLUMNS)[number];
export type ResultRow = Record<ResultColumn, string | number | boolean>;

/** Outcome of one presented trial */
export type TrialResult = {
  trialId: Trial['trialId'];
  trait: string;
  videoLeft: string;
  videoRight: string;
  highPosition: Trial['highPosition'];
  response: Response;
  responseCorrect: boolean;
  /** Seconds from question onset to the response */
  responseTime: number;
  /** 1..N, absent when not asked */
  confidenceRating?: number;
  trialStartTime: number;
  videoOnsetTime: number;
  videoOffsetTime: number;
  responseTimeAbsolute: number;
};

/**
 * Combine a trial with what happened during it
 *
 * @example
 *
 * ```ts
 * const result = createTrialResult(trial, {
 *   response: 'left',
 *   responseTime: 1.2,
 *   trialStartTime: 10,
 *   videoOnsetTime: 11,
 *   videoOffsetTime: 27,
 *   responseTimeAbsolute: 28.2,
 * });
 * result.responseCorrect; // trial.highPosition === 'left'
 * ```
 */
export const createTrialResult = (
  trial: Trial,
  outcome: Pick<
    TrialResult,
    | 'response'
    | 'responseTime'
    | 'confidenceRating'
    | 'trialStartTime'
    | 'videoOnsetTime'
    | 'videoOffsetTime'
    | 'responseTimeAbsolute'
  >,
): TrialResult => {
  if (!(outcome.responseTime >= 0)) {
    throw new Error(
      `Response time should be non-negative, got ${outcome.responseTime}`,
    );
  }
  return {
    trialId: trial.trialId,
    trait: trial.trait,
    videoLeft: trial.videoLeft,
    videoRight: trial.videoRight,
    highPosition: trial.highPosition,
    responseCorrect: choseHigh(trial, outcome.response),
    ...outcome,
  };
};

/** Times are written with 4 decimals */
const time = (value: number | undefined) =>
  value === undefined ? '' : value.toFixed(4);

/**
 * Result row in {@link RESULT_COLUMNS} order; absent fields become `''`
 */
export const toResultRow = (
  result: Partial<TrialResult>,
  participantId: string,
  session: number,
): ResultRow => ({
  participant_id: participantId,
  session,
  trial_id: result.trialId ?? '',
  trait: result.trait ?? '',
  video_left: result.videoLeft ?? '',
  video_right: result.videoRight ?? '',
  high_position: result.highPosition ?? '',
  response: result.response ?? '',
  response_correct: result.responseCorrect ?? '',
  response_time: time(result.responseTime),
  confidence_rating: result.confidenceRating ?? '',
  trial_start_time: time(result.trialStartTime),
  video_onset_time: time(result.videoOnsetTime),
  video_offset_time: time(result.videoOffsetTime),
  response_time_absolute: time(result.responseTimeAbsolute),
});
