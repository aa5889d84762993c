import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { csvLine, parseCsvRecords } from './csv';
import { createTrial, isPracticeId, type Trial } from './trial';

export const TRIAL_COLUMNS = [
  'trial_id',
  'trait',
  'video_left',
  'video_right',
  'high_video',
  'low_video',
  'high_position',
  'is_practice',
] as const;

const trialRowSchema = z
  .object({
    trial_id: z.string(),
    trait: z.string().min(1),
    video_left: z.string().min(1),
    video_right: z.string().min(1),
    high_video: z.string().min(1),
    low_video: z.string().min(1),
    high_position: z.enum(['left', 'right']),
    is_practice: z.enum(['true', 'false', '']).default(''),
  })
  .strict();

const toRow = (trial: Trial) => [
  trial.trialId,
  trial.trait,
  trial.videoLeft,
  trial.videoRight,
  trial.highVideo,
  trial.lowVideo,
  trial.highPosition,
  trial.isPractice,
];

const mainIdOf = (value: string, n: number) => {
  const id = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id) || id < 1) {
    throw new Error(`Row ${n + 1}: invalid trial id "${value}"`);
  }
  return id;
};
const practiceIdOf = (value: string, n: number) => {
  if (!isPracticeId(value)) {
    throw new Error(`Row ${n + 1}: invalid practice trial id "${value}"`);
  }
  return value;
};

/** Serialize trials as CSV text */
export const stringifyTrials = (trials: readonly Trial[]) =>
  csvLine(TRIAL_COLUMNS) + trials.map((trial) => csvLine(toRow(trial))).join('');

/**
 * Parse trials from CSV text written by {@link stringifyTrials}
 *
 * Main trial ids come back as numbers, `practice_N` ids stay strings. The
 * stored left/right videos are checked against the stored HIGH side.
 */
export const parseTrials = (text: string): Trial[] =>
  parseCsvRecords(text).map((record, n) => {
    const row = trialRowSchema.parse(record);
    const base = {
      trait: row.trait,
      highVideo: row.high_video,
      lowVideo: row.low_video,
      highPosition: row.high_position,
    };
    const isPractice = row.is_practice === 'true' || isPracticeId(row.trial_id);
    const trial = isPractice
      ? createTrial({ ...base, trialId: practiceIdOf(row.trial_id, n) })
      : createTrial({ ...base, trialId: mainIdOf(row.trial_id, n) });
    if (trial.videoLeft !== row.video_left || trial.videoRight !== row.video_right) {
      throw new Error(
        `Row ${n + 1}: videos do not match high_position "${row.high_position}"`,
      );
    }
    return trial;
  });

/** Write a trial snapshot, creating the folder when needed */
export const saveTrials = (filepath: string, trials: readonly Trial[]) => {
  mkdirSync(path.dirname(filepath), { recursive: true });
  writeFileSync(filepath, stringifyTrials(trials));
  console.info(`Trial list saved to: ${filepath}`);
};

/** Read a trial snapshot */
export const loadTrials = (filepath: string) =>
  parseTrials(readFileSync(filepath, 'utf-8'));
