import { setTimeout as sleep } from 'node:timers/promises';
import { confirm, isCancel, log, note, select } from '@clack/prompts';
import type {
  Abort,
  Choice,
  Presenter,
  ResponseSource,
  Screen,
  Trial,
} from 'pairwise';

const FRAME_RATE = 60;

/**
 * Stand-in for the video display: each step is printed and its duration
 * slept, scaled by `timeScale`
 */
export class TerminalPresenter implements Presenter {
  #start = performance.now();
  constructor(readonly timeScale = 1) {}
  get frameNumber() {
    return Math.floor(((performance.now() - this.#start) / 1000) * FRAME_RATE);
  }
  #wait(seconds: number) {
    return sleep(seconds * this.timeScale * 1000);
  }
  async showScreen(screen: Screen, text: string): Promise<void | Abort> {
    note(text, screen.toUpperCase());
    const go = await confirm({
      message: screen === 'end' ? 'Exit?' : 'Continue?',
      initialValue: true,
    });
    if (isCancel(go) || !go) return 'abort';
  }
  async showFixation(duration: number) {
    log.message('+');
    await this.#wait(duration);
  }
  async playVideos(trial: Trial, duration: number) {
    log.step(`▶ ${trial.videoLeft}   |   ${trial.videoRight}`);
    await this.#wait(duration);
  }
  showQuestion(question: string) {
    log.info(question);
  }
  showConfidence(levels: number) {
    log.info(`How confident are you? (1 = not at all, ${levels} = very)`);
  }
  async showBlank(duration: number) {
    await this.#wait(duration);
  }
}

/** Choices made with the arrow keys in a select prompt; Ctrl-C aborts */
export class TerminalResponses implements ResponseSource {
  async waitForChoice(): Promise<Choice> {
    const start = performance.now();
    const side = await select({
      message: 'Your choice:',
      options: [
        { value: 'left' as const, label: '← Left video' },
        { value: 'right' as const, label: 'Right video →' },
      ],
    });
    if (isCancel(side)) return { response: 'abort' };
    return { response: side, responseTime: (performance.now() - start) / 1000 };
  }
  async waitForConfidence(levels: number): Promise<number | Abort> {
    const rating = await select({
      message: 'Confidence:',
      options: Array.from({ length: levels }, (_, i) => ({ value: i + 1 })),
    });
    return isCancel(rating) ? 'abort' : rating;
  }
}
