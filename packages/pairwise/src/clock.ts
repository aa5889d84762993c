/**
 * Monotonic session clock in seconds
 *
 * @example
 *
 * ```ts
 * const clock = new Clock();
 * clock.getTime(); // seconds since construction
 * clock.reset(); // back to 0
 * ```
 */
export class Clock {
  #start: number;
  constructor(
    /** Monotonic source in milliseconds */
    readonly now: () => number = () => performance.now(),
  ) {
    this.#start = now();
  }
  getTime() {
    return (this.now() - this.#start) / 1000;
  }
  reset() {
    this.#start = this.now();
  }
}
