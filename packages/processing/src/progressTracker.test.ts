import { describe, expect, it } from 'vitest';
import { ProgressTracker } from './progressTracker.js';

describe('ProgressTracker', () => {
  it('normalizes samples against the denominator', () => {
    const tracker = new ProgressTracker(10000);
    expect(tracker.enabled).toBe(true);
    expect(tracker.offer(2500)).toBe(0.25);
    expect(tracker.offer(5000)).toBe(0.5);
    expect(tracker.lastEmitted).toBe(0.5);
  });

  it('suppresses samples that do not increase', () => {
    const tracker = new ProgressTracker(1000);
    expect(tracker.offer(600)).toBe(0.6);
    expect(tracker.offer(600)).toBeNull();
    expect(tracker.offer(300)).toBeNull();
    expect(tracker.offer(700)).toBe(0.7);
  });

  it('clamps into the unit interval', () => {
    const tracker = new ProgressTracker(1000);
    expect(tracker.offer(-500)).toBeNull();
    expect(tracker.offer(4000)).toBe(1);
    expect(tracker.offer(5000)).toBeNull();
  });

  it('ignores non-finite samples', () => {
    const tracker = new ProgressTracker(1000);
    expect(tracker.offer(Number.NaN)).toBeNull();
    expect(tracker.offer(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('reports nothing without a denominator', () => {
    for (const denominator of [null, 0, -10]) {
      const tracker = new ProgressTracker(denominator);
      expect(tracker.enabled).toBe(false);
      expect(tracker.offer(1000)).toBeNull();
      expect(tracker.complete()).toBeNull();
    }
  });

  it('completes at exactly 1 even after reaching 1', () => {
    const tracker = new ProgressTracker(1000);
    tracker.offer(1000);
    expect(tracker.complete()).toBe(1);
    expect(tracker.lastEmitted).toBe(1);
  });
});
