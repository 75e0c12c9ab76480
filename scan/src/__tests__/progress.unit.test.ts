/**
 * @gridscan/scan - Progress estimate tests
 */

import { describe, it, expect } from 'vitest';
import { ProgressTracker } from '../progress.js';

describe('ProgressTracker', () => {
  it('should report -1 with no resources until finished', () => {
    const tracker = new ProgressTracker(0);
    expect(tracker.percent()).toBe(-1);
    tracker.finish();
    expect(tracker.percent()).toBe(100);
  });

  it('should step through milestones, then proportional batches', () => {
    const tracker = new ProgressTracker(2);
    expect(tracker.percent()).toBe(0);

    tracker.enterPhase('connecting');
    expect(tracker.percent()).toBe(5);
    tracker.enterPhase('fetched');
    expect(tracker.percent()).toBe(20);
    tracker.enterPhase('opened');
    expect(tracker.percent()).toBe(25);

    tracker.recordBatch(2048, 4096);
    expect(tracker.percent()).toBe(36);

    tracker.completeResource();
    expect(tracker.percent()).toBe(50);
    tracker.enterPhase('connecting');
    expect(tracker.percent()).toBe(55);
  });

  it('should step by a fixed amount when the total is unknown, capped below done', () => {
    const tracker = new ProgressTracker(1);
    tracker.enterPhase('opened');

    tracker.recordBatch(100, 0);
    expect(tracker.percent()).toBe(55);

    for (let i = 0; i < 20; i++) {
      tracker.recordBatch(100 * (i + 2), 0);
    }
    expect(tracker.percent()).toBe(95);
  });

  it('should never move backwards within a resource', () => {
    const tracker = new ProgressTracker(1);
    tracker.enterPhase('opened');
    tracker.recordBatch(9000, 10000);
    const before = tracker.percent();

    tracker.enterPhase('connecting');
    tracker.recordBatch(10, 10000);

    expect(tracker.percent()).toBe(before);
    expect(before).toBe(90);
  });

  it('should not count more resources than it has', () => {
    const tracker = new ProgressTracker(1);
    tracker.completeResource();
    tracker.completeResource();
    expect(tracker.percent()).toBe(100);
  });
});
