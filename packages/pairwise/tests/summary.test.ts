import { describe, expect, it } from 'vitest';
import { toResultRow } from '../src/result';
import { summarize } from '../src/summary';

const ids = { participantId: 'P001', session: 1, duration: 42 };

describe('summarize', () => {
  it('should count responses and HIGH choices', () => {
    const rows = [
      toResultRow(
        { trialId: 1, highPosition: 'left', response: 'left', responseTime: 1 },
        'P001',
        1,
      ),
      toResultRow(
        { trialId: 2, highPosition: 'left', response: 'right', responseTime: 2 },
        'P001',
        1,
      ),
      toResultRow(
        {
          trialId: 3,
          highPosition: 'right',
          response: 'timeout',
          responseTime: 3,
        },
        'P001',
        1,
      ),
    ];
    expect(summarize(rows, ids)).toEqual({
      participant_id: 'P001',
      session: 1,
      total_trials: 3,
      responses: { left: 1, right: 1, timeout: 1 },
      mean_response_time: 2,
      high_choice_count: 1,
      high_choice_rate: 1 / 3,
      experiment_duration: 42,
    });
  });

  it('should leave rates empty without trials', () => {
    expect(summarize([], ids)).toEqual({
      participant_id: 'P001',
      session: 1,
      total_trials: 0,
      responses: { left: 0, right: 0, timeout: 0 },
      mean_response_time: null,
      high_choice_count: 0,
      high_choice_rate: null,
      experiment_duration: 42,
    });
  });

  it('should ignore rows without a response or a time', () => {
    const summary = summarize([toResultRow({ trialId: 1 }, 'P001', 1)], ids);
    expect(summary.high_choice_count).toBe(0);
    expect(summary.high_choice_rate).toBe(0);
    expect(summary.mean_response_time).toBeNull();
  });
});
