import { EventEmitter } from '@pairwise/core';
import type { Response } from '../types';
import { questionFor, type ExperimentConfig } from './config';
import { videoRegions, type EyeTracker } from './eye-tracker';
import { createTrialResult, type TrialResult } from './result';
import {
  breakText,
  endText,
  instructionText,
  mainText,
  practiceText,
  welcomeText,
  type Screen,
} from './screens';
import type { TrialSequencer } from './sequencer';
import type { SessionLogger } from './session-logger';
import type { SessionSummary } from './summary';
import type { Trial } from './trial';

/** The participant asked to stop the session */
export type Abort = 'abort';
export type Choice =
  | {
      response: Response;
      /** Seconds from question onset */
      responseTime: number;
    }
  | { response: Abort };

/** Draws everything the participant sees. Durations are in seconds. */
export interface Presenter {
  /** Frames drawn so far */
  readonly frameNumber: number;
  /** Show a text screen until the participant continues */
  showScreen(screen: Screen, text: string): Promise<void | Abort>;
  showFixation(duration: number): Promise<void>;
  /** Called right before the videos start */
  playVideos(trial: Trial, duration: number): Promise<void>;
  /** Keep the question up while the response source waits */
  showQuestion(question: string, trial: Trial): void;
  showConfidence(levels: number): void;
  /** Blank screen between trials */
  showBlank(duration: number): Promise<void>;
}

/** Where the participant's answers come from */
export interface ResponseSource {
  /** `timeout` in seconds, `null` waits indefinitely */
  waitForChoice(timeout: number | null): Promise<Choice>;
  /** Rating in `1..levels` */
  waitForConfidence(levels: number): Promise<number | Abort>;
}

export type SessionStatus = 'completed' | 'aborted';

/**
 * Run one participant session: instructions, practice, main trials with
 * breaks, end screen
 *
 * The logger is finalized and the tracker disconnected exactly once, by
 * {@link ExperimentSession.close}, however the run ends.
 *
 * @example
 *
 * ```ts
 * const session = new ExperimentSession({
 *   sequencer,
 *   logger,
 *   tracker: createEyeTracker(config),
 *   presenter,
 *   responses,
 * });
 * process.once('SIGINT', () => session.close());
 * await session.run(); // 'completed' | 'aborted'
 * ```
 */
export class ExperimentSession extends EventEmitter<{
  trial: TrialResult;
  close: SessionSummary;
}> {
  readonly config: ExperimentConfig;
  readonly sequencer: TrialSequencer;
  readonly logger: SessionLogger;
  readonly tracker: EyeTracker;
  readonly presenter: Presenter;
  readonly responses: ResponseSource;
  #summary?: SessionSummary;
  #closed = false;
  constructor(parts: {
    sequencer: TrialSequencer;
    logger: SessionLogger;
    tracker: EyeTracker;
    presenter: Presenter;
    responses: ResponseSource;
  }) {
    super();
    this.sequencer = parts.sequencer;
    this.logger = parts.logger;
    this.tracker = parts.tracker;
    this.presenter = parts.presenter;
    this.responses = parts.responses;
    this.config = parts.sequencer.config;

    this.on('dispose', () => this.close());
  }
  get closed() {
    return this.#closed;
  }
  /**
   * Run the session to its end, until the participant aborts or until it is
   * closed
   *
   * @param startIndex 0-based index of the first main trial, to resume a
   *   session
   */
  async run(startIndex = 0): Promise<SessionStatus> {
    try {
      return await this.#run(startIndex);
    } finally {
      this.close();
    }
  }
  async #run(startIndex: number): Promise<SessionStatus> {
    const { config, sequencer, logger, tracker, presenter } = this;
    if (this.#closed) return 'aborted';

    tracker.connect();
    tracker.calibrate();
    logger.logEvent('session_start');

    if (
      this.#interrupted(
        await presenter.showScreen('welcome', welcomeText(config)),
      ) ||
      this.#interrupted(
        await presenter.showScreen('instructions', instructionText(config)),
      )
    ) {
      return this.#abort();
    }

    // practice
    if (config.includePractice && sequencer.practiceTrials.length) {
      const screen = await presenter.showScreen('practice', practiceText());
      if (this.#interrupted(screen)) return this.#abort();
      for (const trial of sequencer.practiceTrials) {
        if ((await this.runTrial(trial)) === 'abort') return this.#abort();
      }
      if (this.#interrupted(await presenter.showScreen('main', mainText())))
        return this.#abort();
    }

    // main trials
    for (let i = startIndex; i < sequencer.total; i++) {
      sequencer.currentIndex = i;
      const trial = sequencer.getCurrentTrial();
      if (!trial) break;

      if (sequencer.shouldTakeBreak()) {
        logger.logEvent('break_start');
        const screen = await presenter.showScreen(
          'break',
          breakText(i, sequencer.total),
        );
        if (this.#interrupted(screen)) return this.#abort();
        logger.logEvent('break_end');
        tracker.driftCheck();
      }

      const result = await this.runTrial(trial);
      if (result === 'abort') return this.#abort();
      console.info(
        `Trial ${trial.trialId}/${sequencer.total}: ${trial.trait}, Response: ${result.response}, RT: ${result.responseTime.toFixed(4)}s`,
      );
    }

    logger.logEvent('session_end');
    await presenter.showScreen('end', endText());
    return 'completed';
  }
  /** The participant aborted, or the session was closed while waiting */
  #interrupted(value: void | Abort) {
    return value === 'abort' || this.#closed;
  }
  #abort(): SessionStatus {
    // closed from outside, by a signal handler for instance: the log is final
    if (this.#closed) return 'aborted';
    this.logger.logEvent('session_abort');
    console.info('Experiment terminated by participant.');
    return 'aborted';
  }
  /**
   * Present one trial and collect its responses
   *
   * Main trial results are logged, practice results are only returned. A
   * trial interrupted by {@link ExperimentSession.close} logs nothing more and
   * returns `'abort'`.
   */
  async runTrial(trial: Trial): Promise<TrialResult | Abort> {
    const { config, logger, tracker, presenter, responses } = this;
    const { trialId } = trial;
    if (this.#closed) return 'abort';

    tracker.startRecording(trialId);
    tracker.sendMessage(`TRIAL_START ${trialId}`);
    const trialStartTime = logger.logEvent(
      'trial_start',
      trialId,
      undefined,
      presenter.frameNumber,
    );

    // fixation
    logger.logEvent('fixation_onset', trialId);
    tracker.sendMessage('FIXATION_ONSET');
    await presenter.showFixation(config.fixationDuration);
    if (this.#closed) return 'abort';

    // videos
    const videoOnsetTime = logger.logEvent(
      'video_onset',
      trialId,
      `${trial.videoLeft}|${trial.videoRight}`,
      presenter.frameNumber,
    );
    tracker.sendMessage('VIDEO_ONSET');
    tracker.sendVariable('video_left', trial.videoLeft);
    tracker.sendVariable('video_right', trial.videoRight);
    tracker.sendVariable('trait', trial.trait);
    tracker.sendVariable('high_position', trial.highPosition);
    for (const region of videoRegions(config)) tracker.defineRegion(region);
    await presenter.playVideos(trial, config.videoDuration);
    if (this.#closed) return 'abort';
    const videoOffsetTime = logger.logEvent(
      'video_offset',
      trialId,
      undefined,
      presenter.frameNumber,
    );
    tracker.sendMessage('VIDEO_OFFSET');

    // choice
    presenter.showQuestion(questionFor(config, trial.trait), trial);
    tracker.sendMessage('QUESTION_ONSET');
    const choice = await responses.waitForChoice(config.responseTimeout);
    if (choice.response === 'abort' || this.#closed) return this.#cancel();
    const { response, responseTime } = choice;
    const responseTimeAbsolute = logger.logEvent(
      'response',
      trialId,
      `response=${response},rt=${responseTime.toFixed(4)}`,
    );
    tracker.sendMessage(`RESPONSE ${trialId} ${response}`);
    tracker.sendVariable('response', response);
    tracker.sendVariable('response_time', responseTime.toFixed(4));

    // confidence
    let confidenceRating: number | undefined;
    if (config.enableConfidenceRating) {
      presenter.showConfidence(config.confidenceLevels);
      const rating = await responses.waitForConfidence(config.confidenceLevels);
      if (rating === 'abort' || this.#closed) return this.#cancel();
      confidenceRating = rating;
      logger.logEvent('confidence', trialId, `rating=${rating}`);
      tracker.sendVariable('confidence', rating);
    }

    tracker.sendMessage(`TRIAL_END ${trialId}`);
    tracker.stopRecording();
    await presenter.showBlank(config.interTrialInterval);
    if (this.#closed) return 'abort';

    const result = createTrialResult(trial, {
      response,
      responseTime,
      confidenceRating,
      trialStartTime,
      videoOnsetTime,
      videoOffsetTime,
      responseTimeAbsolute,
    });
    if (!trial.isPractice) logger.logTrialResult(result);
    this.emit('trial', result);
    return result;
  }
  #cancel(): Abort {
    if (!this.#closed) this.tracker.stopRecording();
    return 'abort';
  }
  /**
   * Finalize the logger and disconnect the tracker, once
   *
   * Later calls return the summary of the first.
   */
  close() {
    if (this.#closed) return this.#summary;
    this.#closed = true;
    try {
      this.#summary = this.logger.finalize();
      this.emit('close', this.#summary);
      return this.#summary;
    } finally {
      this.tracker.disconnect();
    }
  }
}
