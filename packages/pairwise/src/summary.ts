import type { ResultRow } from './result';

export type SessionSummary = {
  participant_id: string;
  session: number;
  total_trials: number;
  responses: { left: number; right: number; timeout: number };
  /** Over rows with a parseable response time, `null` if there is none */
  mean_response_time: number | null;
  high_choice_count: number;
  /** `high_choice_count / total_trials`, `null` without trials */
  high_choice_rate: number | null;
  /** Seconds on the session clock */
  experiment_duration: number;
};

const parseTime = (value: ResultRow['response_time']) => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
};

/** Aggregate statistics of the logged results */
export const summarize = (
  rows: readonly ResultRow[],
  ids: { participantId: string; session: number; duration: number },
): SessionSummary => {
  const responses = { left: 0, right: 0, timeout: 0 };
  let high_choice_count = 0;
  const times: number[] = [];

  for (const row of rows) {
    const { response } = row;
    if (response === 'left' || response === 'right' || response === 'timeout')
      responses[response]++;
    if (response !== '' && response === row.high_position) high_choice_count++;
    const rt = parseTime(row.response_time);
    if (rt !== null) times.push(rt);
  }

  const total_trials = rows.length;
  return {
    participant_id: ids.participantId,
    session: ids.session,
    total_trials,
    responses,
    mean_response_time: times.length
      ? times.reduce((acc, t) => acc + t, 0) / times.length
      : null,
    high_choice_count,
    high_choice_rate: total_trials ? high_choice_count / total_trials : null,
    experiment_duration: ids.duration,
  };
};
