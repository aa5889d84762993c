import type { ExperimentConfig } from './config';
import type { TrialId } from './trial';

export type GazeSample = { x: number; y: number; pupilSize: number };
/** Rectangle in screen pixels, origin at the top-left corner */
export type Region = {
  id: number;
  left: number;
  top: number;
  right: number;
  bottom: number;
  label: string;
};

/** Longest marker message the tracker stores */
export const MAX_MESSAGE_LENGTH = 150;

/**
 * Low-level connection to eye-tracking hardware, provided by a vendor binding
 *
 * Any method may throw or return `false` on failure.
 */
export interface EyeTrackerDriver {
  connect(): boolean | void;
  calibrate(): boolean | void;
  driftCheck(x: number, y: number): boolean | void;
  startRecording(): boolean | void;
  stopRecording(): void;
  sendMessage(message: string): void;
  getNewestSample(): GazeSample | null | undefined;
  disconnect(): void;
}

/**
 * What the session expects from an eye tracker. Every call is best-effort: a
 * missing or failing tracker never stops the trial sequence.
 */
export interface EyeTracker {
  /** `false` when running without hardware */
  readonly enabled: boolean;
  connect(): boolean;
  calibrate(): boolean;
  driftCheck(x?: number, y?: number): boolean;
  startRecording(trialId?: TrialId): void;
  stopRecording(): void;
  /** Timestamped marker, cut to {@link MAX_MESSAGE_LENGTH} characters */
  sendMessage(message: string): void;
  /** Trial variable for data viewers */
  sendVariable(name: string, value: string | number | boolean | null): void;
  defineRegion(region: Region): void;
  getLatestGazeSample(): GazeSample | undefined;
  disconnect(): void;
}

const variableMessage = (name: string, value: unknown) =>
  `!V TRIAL_VAR ${name} ${value}`;
const regionMessage = ({ id, left, top, right, bottom, label }: Region) =>
  `!V IAREA RECTANGLE ${id} ${left} ${top} ${right} ${bottom} ${label}`;

/**
 * Stand-in used without hardware. Calls are logged and the gaze sample is
 * always at the origin, in the same shape as real samples.
 */
export class SimulatedEyeTracker implements EyeTracker {
  readonly enabled = false;
  isConnected = false;
  isRecording = false;
  readonly messages: string[] = [];
  #log(call: string) {
    console.info(`[eye-tracker simulated] ${call}`);
  }
  connect() {
    this.#log('connect()');
    return (this.isConnected = true);
  }
  calibrate() {
    this.#log('calibrate()');
    return true;
  }
  driftCheck(x?: number, y?: number) {
    this.#log(`driftCheck(x=${x}, y=${y})`);
    return true;
  }
  startRecording(trialId?: TrialId) {
    this.#log(`startRecording(trialId=${trialId})`);
    this.isRecording = true;
  }
  stopRecording() {
    this.#log('stopRecording()');
    this.isRecording = false;
  }
  sendMessage(message: string) {
    message = message.slice(0, MAX_MESSAGE_LENGTH);
    this.messages.push(message);
    this.#log(`sendMessage('${message}')`);
  }
  sendVariable(name: string, value: string | number | boolean | null) {
    this.sendMessage(variableMessage(name, value));
  }
  defineRegion(region: Region) {
    this.sendMessage(regionMessage(region));
  }
  getLatestGazeSample(): GazeSample {
    return { x: 0, y: 0, pupilSize: 0 };
  }
  disconnect() {
    this.#log('disconnect()');
    this.isConnected = false;
    this.isRecording = false;
  }
}

/**
 * Hardware tracker behind the best-effort contract
 *
 * The first failure of the driver (an exception, or `false` from connect,
 * calibration or recording start) is reported once with `console.warn`; from
 * then on the tracker is degraded and every call goes to a
 * {@link SimulatedEyeTracker}. Nothing is retried.
 */
export class HardwareEyeTracker implements EyeTracker {
  #degraded = false;
  #fallback = new SimulatedEyeTracker();
  isRecording = false;
  /** Why the tracker degraded */
  failure?: string;
  constructor(
    readonly driver: EyeTrackerDriver,
    readonly screen: { width: number; height: number },
  ) {}
  get enabled() {
    return !this.#degraded;
  }
  #degrade(failure: string) {
    this.#degraded = true;
    this.failure = failure;
    console.warn(`Eye tracker: ${failure}. Continuing without eye tracking.`);
  }
  #guard<T>(name: string, run: () => T, fallback: () => T): T {
    if (this.#degraded) return fallback();
    try {
      return run();
    } catch (err) {
      this.#degrade(
        `${name} failed (${err instanceof Error ? err.message : String(err)})`,
      );
      return fallback();
    }
  }
  #step(name: string, run: () => boolean | void) {
    const ok = this.#guard(name, () => run() !== false, () => false);
    if (!ok && !this.#degraded) this.#degrade(`${name} failed`);
    return ok;
  }
  connect() {
    return this.#step('connection', () => this.driver.connect());
  }
  calibrate() {
    return this.#step('calibration', () => this.driver.calibrate());
  }
  /** `false` asks for recalibration, it does not degrade the tracker */
  driftCheck(x = this.screen.width / 2, y = this.screen.height / 2) {
    return this.#guard(
      'drift check',
      () => this.driver.driftCheck(Math.floor(x), Math.floor(y)) !== false,
      () => this.#fallback.driftCheck(x, y),
    );
  }
  startRecording(trialId?: TrialId) {
    if (!this.#step('recording start', () => this.driver.startRecording())) {
      return this.#fallback.startRecording(trialId);
    }
    this.isRecording = true;
    if (trialId !== undefined) this.sendMessage(`TRIAL_ID ${trialId}`);
  }
  stopRecording() {
    if (!this.isRecording) return;
    this.isRecording = false;
    this.#guard(
      'recording stop',
      () => this.driver.stopRecording(),
      () => this.#fallback.stopRecording(),
    );
  }
  sendMessage(message: string) {
    message = message.slice(0, MAX_MESSAGE_LENGTH);
    this.#guard(
      'message',
      () => this.driver.sendMessage(message),
      () => this.#fallback.sendMessage(message),
    );
  }
  sendVariable(name: string, value: string | number | boolean | null) {
    this.sendMessage(variableMessage(name, value));
  }
  defineRegion(region: Region) {
    this.sendMessage(regionMessage(region));
  }
  getLatestGazeSample() {
    return this.#guard<GazeSample | undefined>(
      'gaze sample',
      () => this.driver.getNewestSample() ?? undefined,
      () => this.#fallback.getLatestGazeSample(),
    );
  }
  disconnect() {
    this.stopRecording();
    this.#guard(
      'disconnect',
      () => this.driver.disconnect(),
      () => this.#fallback.disconnect(),
    );
  }
}

/**
 * Tracker for a session: the hardware one when enabled and a driver is
 * available, the simulation otherwise
 */
export const createEyeTracker = (
  config: ExperimentConfig,
  driver?: EyeTrackerDriver,
): EyeTracker => {
  if (config.eyeTrackerEnabled && driver) {
    return new HardwareEyeTracker(driver, {
      width: config.screenWidth,
      height: config.screenHeight,
    });
  }
  if (config.eyeTrackerEnabled) {
    console.warn('Eye tracking enabled but no driver available, simulating.');
  }
  console.info('Eye tracker running in simulation mode');
  return new SimulatedEyeTracker();
};

/** Centres of the two videos, origin at the screen centre, y up */
export const videoPositions = (config: ExperimentConfig) => {
  const offset = config.videoSeparation / 2 + config.videoWidth / 2;
  return {
    left: { x: -offset, y: 0 },
    right: { x: offset, y: 0 },
  };
};

/**
 * Interest areas around the two videos, padded and converted to top-left
 * screen coordinates (y down)
 *
 * @example
 *
 * ```ts
 * // 1920×1080 screen, 640×480 videos 100 px apart, 20 px padding
 * const [left, right] = videoRegions(defineConfig());
 * left; // { id: 1, left: 250, top: 280, right: 930, bottom: 800, label: 'LEFT_VIDEO' }
 * ```
 */
export const videoRegions = (config: ExperimentConfig): [Region, Region] => {
  const { left, right } = videoPositions(config);
  const halfWidth = Math.floor(config.videoWidth / 2) + config.interestAreaPadding;
  const halfHeight =
    Math.floor(config.videoHeight / 2) + config.interestAreaPadding;
  const centreX = Math.floor(config.screenWidth / 2);
  const centreY = Math.floor(config.screenHeight / 2);
  const region = (id: number, pos: { x: number; y: number }, label: string) => {
    const x = centreX + pos.x;
    const y = centreY - pos.y;
    return {
      id,
      left: Math.trunc(x - halfWidth),
      top: Math.trunc(y - halfHeight),
      right: Math.trunc(x + halfWidth),
      bottom: Math.trunc(y + halfHeight),
      label,
    };
  };
  return [region(1, left, 'LEFT_VIDEO'), region(2, right, 'RIGHT_VIDEO')];
};
