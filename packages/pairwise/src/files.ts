import { existsSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import type { ExperimentConfig } from './config';

export type SessionFiles = {
  /** File name stem shared by all files of the session */
  basename: string;
  results: string;
  events: string;
  summary: string;
  trials: string;
};

const pad = (value: number) => String(value).padStart(2, '0');
/** Local time as `YYYYMMDD_HHMMSS` */
export const sessionStamp = (date: Date) =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

const pathsOf = (
  folder: string,
  basename: string,
  format: ExperimentConfig['dataFileFormat'],
): SessionFiles => ({
  basename,
  results: path.join(folder, `${basename}.${format}`),
  events: path.join(folder, `${basename}_events.csv`),
  summary: path.join(folder, `${basename}_summary.json`),
  trials: path.join(folder, `${basename}_trials.csv`),
});

/**
 * Paths of the data files of a session, named
 * `<prefix>_<participant>_<YYYYMMDD_HHMMSS>`; characters of the participant id
 * other than letters, digits, `_` and `-` become `_`.
 *
 * A numeric suffix is added while any of the paths already exists, so a rerun
 * within the same second never overwrites earlier data. The data folder is
 * created.
 */
export const createSessionFiles = (
  config: ExperimentConfig,
  participantId: string,
  date = new Date(),
) => {
  mkdirSync(config.dataFolder, { recursive: true });
  const safeId = participantId.replace(/[^\w-]/g, '_');
  const stem = `${config.dataFilePrefix}_${safeId}_${sessionStamp(date)}`;
  for (let n = 1; ; n++) {
    const files = pathsOf(
      config.dataFolder,
      n === 1 ? stem : `${stem}_${n}`,
      config.dataFileFormat,
    );
    const { basename: _, ...paths } = files;
    if (!Object.values(paths).some((p) => existsSync(p))) return files;
  }
};
