import { describe, expect, it } from 'vitest';
import {
  choseHigh,
  createTrial,
  isPracticeId,
  practiceId,
  renumber,
} from '../src/trial';

const fields = {
  trait: 'Openness',
  highVideo: 'h1.mp4',
  lowVideo: 'l1.mp4',
} as const;

describe('createTrial', () => {
  it('should place the HIGH video on its side', () => {
    const left = createTrial({ ...fields, trialId: 1, highPosition: 'left' });
    expect([left.videoLeft, left.videoRight]).toEqual(['h1.mp4', 'l1.mp4']);

    const right = createTrial({ ...fields, trialId: 2, highPosition: 'right' });
    expect([right.videoLeft, right.videoRight]).toEqual(['l1.mp4', 'h1.mp4']);
  });

  it('should mark practice trials by their id', () => {
    const main = createTrial({ ...fields, trialId: 1, highPosition: 'left' });
    const practice = createTrial({
      ...fields,
      trialId: practiceId(1),
      highPosition: 'left',
    });
    expect(main.isPractice).toBe(false);
    expect(practice.isPractice).toBe(true);
    expect(practice.trialId).toBe('practice_1');
  });

  it('should freeze the trial', () => {
    const trial = createTrial({ ...fields, trialId: 1, highPosition: 'left' });
    expect(Object.isFrozen(trial)).toBe(true);
  });

  it('should reject a video compared with itself', () => {
    expect(() =>
      createTrial({
        ...fields,
        lowVideo: 'h1.mp4',
        trialId: 3,
        highPosition: 'left',
      }),
    ).toThrow('Trial 3 compares "h1.mp4" with itself for Openness');
  });

  it('should reject ids that are not positive integers', () => {
    expect(() =>
      createTrial({ ...fields, trialId: 0, highPosition: 'left' }),
    ).toThrow('Trial id should be a positive integer, got 0');
    expect(() =>
      createTrial({ ...fields, trialId: 1.5, highPosition: 'left' }),
    ).toThrow('Trial id should be a positive integer, got 1.5');
  });
});

describe('isPracticeId', () => {
  it('should accept practice_N with N >= 1', () => {
    expect(isPracticeId('practice_1')).toBe(true);
    expect(isPracticeId('practice_12')).toBe(true);
    expect(isPracticeId('practice_0')).toBe(false);
    expect(isPracticeId('practice_x')).toBe(false);
    expect(isPracticeId('12')).toBe(false);
  });
});

describe('renumber', () => {
  it('should copy a trial under a new id', () => {
    const trial = createTrial({ ...fields, trialId: 4, highPosition: 'right' });
    const copy = renumber(trial, 1);
    expect(copy).toEqual({ ...trial, trialId: 1 });
    expect(trial.trialId).toBe(4);
  });
});

describe('choseHigh', () => {
  it('should compare the response with the HIGH side', () => {
    const trial = createTrial({ ...fields, trialId: 1, highPosition: 'right' });
    expect(choseHigh(trial, 'right')).toBe(true);
    expect(choseHigh(trial, 'left')).toBe(false);
    expect(choseHigh(trial, 'timeout')).toBe(false);
  });
});
