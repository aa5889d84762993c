import { confirm, select } from '@clack/prompts';
import { createTrial } from 'pairwise';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TerminalPresenter, TerminalResponses } from '../src/terminal';

const cancel = vi.hoisted(() => Symbol('clack:cancel'));

vi.mock('@clack/prompts', () => ({
  confirm: vi.fn(),
  select: vi.fn(),
  note: vi.fn(),
  isCancel: (value: unknown) => value === cancel,
  log: { message: vi.fn(), step: vi.fn(), info: vi.fn() },
}));

describe('TerminalResponses', () => {
  beforeEach(() => {
    vi.mocked(select).mockReset();
  });

  it('should return the chosen side with a response time', async () => {
    vi.mocked(select).mockResolvedValueOnce('right');
    const choice = await new TerminalResponses().waitForChoice();
    expect(choice).toEqual({ response: 'right', responseTime: expect.any(Number) });
  });

  it('should abort when the prompt is cancelled', async () => {
    vi.mocked(select).mockResolvedValueOnce(cancel);
    expect(await new TerminalResponses().waitForChoice()).toEqual({
      response: 'abort',
    });
    vi.mocked(select).mockResolvedValueOnce(cancel);
    expect(await new TerminalResponses().waitForConfidence(5)).toBe('abort');
  });

  it('should offer one option per confidence level', async () => {
    vi.mocked(select).mockResolvedValueOnce(2);
    expect(await new TerminalResponses().waitForConfidence(3)).toBe(2);
    expect(vi.mocked(select).mock.calls[0]?.[0].options).toEqual([
      { value: 1 },
      { value: 2 },
      { value: 3 },
    ]);
  });
});

describe('TerminalPresenter', () => {
  it('should abort a screen when the participant declines or cancels', async () => {
    const presenter = new TerminalPresenter(0);
    vi.mocked(confirm).mockResolvedValueOnce(true);
    expect(await presenter.showScreen('welcome', 'Hello')).toBeUndefined();
    vi.mocked(confirm).mockResolvedValueOnce(false);
    expect(await presenter.showScreen('break', 'Rest')).toBe('abort');
    vi.mocked(confirm).mockResolvedValueOnce(cancel);
    expect(await presenter.showScreen('end', 'Bye')).toBe('abort');
  });

  it('should not wait with a time scale of 0', async () => {
    const presenter = new TerminalPresenter(0);
    const trial = createTrial({
      trialId: 1,
      trait: 'Openness',
      highVideo: 'h1.mp4',
      lowVideo: 'l1.mp4',
      highPosition: 'left',
    });
    await presenter.playVideos(trial, 16);
    expect(presenter.frameNumber).toBeGreaterThanOrEqual(0);
  });
});
