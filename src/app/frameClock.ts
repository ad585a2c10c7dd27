export type Now = () => number;

/** Monotonic milliseconds. */
export const monotonicNow: Now = () => performance.now();

/**
 * Measures seconds between frames. Capping is left to the runner, which
 * receives the raw value.
 */
export class FrameClock {
  private last: number;

  constructor(private now: Now = monotonicNow) {
    this.last = now();
  }

  /** Seconds since the previous call (or since construction / restart). */
  delta(): number {
    const t = this.now();
    const dt = Math.max(0, (t - this.last) / 1000);
    this.last = t;
    return dt;
  }

  restart(): void {
    this.last = this.now();
  }
}
