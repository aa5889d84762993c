import { writeFileSync } from 'node:fs';
import { EventEmitter } from '@pairwise/core';
import autoBind from 'auto-bind';
import { Clock } from './clock';
import { appendToFile, Collector } from './collector';
import type { ExperimentConfig } from './config';
import { createSessionFiles, type SessionFiles } from './files';
import {
  RESULT_COLUMNS,
  toResultRow,
  type ResultRow,
  type TrialResult,
} from './result';
import { summarize, type SessionSummary } from './summary';
import type { TrialId } from './trial';

export const EVENT_COLUMNS = [
  'timestamp',
  'event_type',
  'trial_id',
  'details',
  'frame_number',
] as const;
/** One timestamped row of the event log */
export type EventRecord = {
  /** Seconds on the session clock */
  timestamp: number;
  event_type: string;
  trial_id: TrialId | null;
  details: string | null;
  /** Render frame counter supplied by the presenter */
  frame_number: number | null;
};

/**
 * Record events and trial results of one participant session
 *
 * Every event and every result reaches its file before the call returns, so
 * a crash loses nothing that was logged. Write errors are thrown to the
 * caller, and so is any logging after {@link SessionLogger.finalize}.
 *
 * Files, named after the participant and the session start:
 *
 * - `<name>.csv` (or `.json`): one row per trial result
 * - `<name>_events.csv`: one row per event
 * - `<name>_summary.json`: written by {@link SessionLogger.finalize}
 *
 * @example
 *
 * ```ts
 * const logger = new SessionLogger(config, 'P001', 1);
 * process.once('SIGINT', logger.finalize); // methods are bound
 *
 * const start = logger.logEvent('trial_start', 1);
 * logger.logEvent('video_onset', 1, 'a.mp4|b.mp4', 42);
 * logger.findEventTime('video_onset', 1); // timestamp of the event above
 * logger.logTrialResult(result);
 * logger.finalize();
 * ```
 */
export class SessionLogger extends EventEmitter<{ finalize: SessionSummary }> {
  readonly files: SessionFiles;
  readonly clock: Clock;
  #results: Collector<ResultRow>;
  #events: Collector<EventRecord>;
  #last_timestamp = 0;
  #finalize_count = 0;
  constructor(
    public readonly config: ExperimentConfig,
    public readonly participantId: string,
    public readonly session = 1,
    options: {
      clock?: Clock;
      /** Session start used in file names @default new Date() */
      date?: Date;
    } = {},
  ) {
    super();
    autoBind(this);

    this.clock = options.clock ?? new Clock();
    this.files = createSessionFiles(config, participantId, options.date);
    this.#results = appendToFile(
      new Collector<ResultRow>(this.files.results, RESULT_COLUMNS),
      this.files.results,
    ).open();
    this.#events = appendToFile(
      new Collector<EventRecord>(this.files.events, EVENT_COLUMNS),
      this.files.events,
    ).open();

    this.on('dispose', () => this.finalize());
    console.info(`Session logger initialized. Data file: ${this.files.results}`);
  }
  get events(): readonly EventRecord[] {
    return this.#events.rows;
  }
  get results(): readonly ResultRow[] {
    return this.#results.rows;
  }
  get trialCount() {
    return this.#results.rows.length;
  }
  get lastResult(): ResultRow | undefined {
    return this.#results.rows.at(-1);
  }
  get finalized() {
    return this.#finalize_count > 0;
  }
  #assertOpen(what: string) {
    if (this.#finalize_count)
      throw new Error(`Cannot log ${what}, the session logger is finalized.`);
  }
  /** Seconds since the clock started, without logging anything */
  getCurrentTime() {
    return this.clock.getTime();
  }
  /**
   * Restart the clock at 0
   *
   * Event timestamps never decrease: until the clock passes the last logged
   * timestamp again, new events carry that timestamp.
   */
  resetClock() {
    this.clock.reset();
  }
  /**
   * Log a timestamped event and return its timestamp
   *
   * @param eventType e.g. `trial_start`, `fixation_onset`, `video_onset`,
   *   `video_offset`, `response`, `confidence`
   */
  logEvent(
    eventType: string,
    trialId?: TrialId,
    details?: string,
    frameNumber?: number,
  ) {
    this.#assertOpen(`event "${eventType}"`);
    const timestamp = Math.max(this.clock.getTime(), this.#last_timestamp);
    this.#last_timestamp = timestamp;
    this.#events.add({
      timestamp,
      event_type: eventType,
      trial_id: trialId ?? null,
      details: details ?? null,
      frame_number: frameNumber ?? null,
    });
    return timestamp;
  }
  /**
   * Timestamp of the latest event of a type, optionally of one trial
   *
   * The search runs from the newest event, since most event types recur once
   * per trial.
   */
  findEventTime(eventType: string, trialId?: TrialId) {
    return this.#events.rows.findLast(
      (e) =>
        e.event_type === eventType &&
        (trialId === undefined || e.trial_id === trialId),
    )?.timestamp;
  }
  /**
   * Log the result of a completed trial
   *
   * Absent fields are written empty. Practice results are not meant to be
   * logged; skipping them is up to the caller.
   */
  logTrialResult(result: Partial<TrialResult>) {
    this.#assertOpen(`trial ${result.trialId ?? '?'}`);
    const row = toResultRow(result, this.participantId, this.session);
    this.#results.add(row);
    console.info(`Trial ${result.trialId ?? '?'} logged`);
    return row;
  }
  /**
   * Close the data files and write the session summary
   *
   * In `json` format the results file is rewritten as one document holding
   * the whole session. Files are overwritten, so calling this again, from a
   * signal handler for instance, only refreshes them.
   */
  finalize() {
    if (!this.#finalize_count++) {
      this.#results.save();
      this.#events.save();
    }

    if (this.config.dataFileFormat === 'json') {
      writeFileSync(
        this.files.results,
        JSON.stringify(
          {
            participant_id: this.participantId,
            session: this.session,
            experiment: this.config.experimentName,
            version: this.config.experimentVersion,
            timestamp: new Date().toISOString(),
            trials: this.results,
            events: this.events,
          },
          null,
          2,
        ),
      );
    }

    const summary = summarize(this.results, {
      participantId: this.participantId,
      session: this.session,
      duration: this.getCurrentTime(),
    });
    writeFileSync(this.files.summary, JSON.stringify(summary, null, 2));
    console.info(`Data finalized and saved to: ${this.files.results}`);
    this.emit('finalize', summary);
    return summary;
  }
}
