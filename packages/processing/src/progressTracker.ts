/**
 * Progress Tracker
 *
 * Normalizes elapsed-time samples against a denominator into a 0..1 ratio.
 * Emitted values never decrease: a sample is reported only when it is
 * strictly above the last reported value. Without a denominator nothing is
 * reported.
 */

export class ProgressTracker {
  private readonly denominatorMs: number | null;
  private last = 0;

  constructor(denominatorMs: number | null) {
    this.denominatorMs = denominatorMs !== null && denominatorMs > 0 ? denominatorMs : null;
  }

  get enabled(): boolean {
    return this.denominatorMs !== null;
  }

  get lastEmitted(): number {
    return this.last;
  }

  /**
   * Returns the value to emit, or null when the sample is suppressed
   */
  offer(elapsedMs: number): number | null {
    if (this.denominatorMs === null || !Number.isFinite(elapsedMs)) return null;

    const ratio = Math.min(1, Math.max(0, elapsedMs / this.denominatorMs));
    if (ratio <= this.last) return null;

    this.last = ratio;
    return ratio;
  }

  /**
   * Final value on success: always 1.0, or null without a denominator
   */
  complete(): number | null {
    if (this.denominatorMs === null) return null;
    this.last = 1;
    return 1;
  }
}
