/**
 * Advisory progress estimate for a scan, as a percentage.
 *
 * Each resource contributes an equal share. Within a resource the estimate
 * steps through fixed milestones, then advances with the samples read.
 */

import type { ResourcePhase } from './pipeline.js';

const PHASE_PERCENT: Record<ResourcePhase, number> = {
  connecting: 10,
  fetched: 40,
  opened: 50,
};

const BATCH_FLOOR = 50;
const BATCH_CEILING = 95;
const BATCH_STEP = 5;

export class ProgressTracker {
  private completed = 0;
  private current = 0;
  private done = false;

  constructor(private readonly totalResources: number) {}

  enterPhase(phase: ResourcePhase): void {
    this.current = Math.max(this.current, PHASE_PERCENT[phase]);
  }

  /**
   * Record a batch read from the current resource. With a known sample
   * total the estimate is proportional; otherwise it steps by a fixed amount.
   */
  recordBatch(samplesRead: number, totalSamples: number): void {
    const next =
      totalSamples > 0
        ? BATCH_FLOOR + Math.floor(((BATCH_CEILING - BATCH_FLOOR) * Math.min(samplesRead, totalSamples)) / totalSamples)
        : this.current + BATCH_STEP;
    this.current = Math.max(this.current, Math.min(BATCH_CEILING, next));
  }

  completeResource(): void {
    this.completed = Math.min(this.totalResources, this.completed + 1);
    this.current = 0;
  }

  finish(): void {
    this.done = true;
  }

  /**
   * Percentage in [0, 100], or -1 when the scan has no resources to measure by.
   */
  percent(): number {
    if (this.done) {
      return 100;
    }
    if (this.totalResources <= 0) {
      return -1;
    }
    return (this.completed * 100 + this.current) / this.totalResources;
  }
}
