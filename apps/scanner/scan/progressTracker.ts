export const RATE_SMOOTHING = 0.95;

export type Clock = () => number;

export interface ProgressSnapshot {
  tested: number;
  total: number;
  elapsedSeconds: number;
  remainingSeconds: number;
  /** Smoothed seconds per completed probe. */
  rate: number;
}

export class ProgressTracker {
  private tested = 0;
  private rate = 0;
  private readonly startedAt: number;
  private lastCompletionAt: number;

  /** `clock` returns milliseconds. */
  constructor(
    readonly total: number,
    private readonly clock: Clock = Date.now
  ) {
    this.startedAt = clock();
    this.lastCompletionAt = this.startedAt;
  }

  recordCompletion(): void {
    if (this.tested >= this.total) {
      throw new RangeError(`All ${this.total} probes have already been recorded`);
    }

    const now = this.clock();
    const delta = (now - this.lastCompletionAt) / 1000;
    this.tested++;
    this.rate = this.tested === 1 ? delta : RATE_SMOOTHING * this.rate + (1 - RATE_SMOOTHING) * delta;
    this.lastCompletionAt = now;
  }

  get finished(): boolean {
    return this.tested === this.total;
  }

  snapshot(): ProgressSnapshot {
    return {
      tested: this.tested,
      total: this.total,
      elapsedSeconds: (this.clock() - this.startedAt) / 1000,
      remainingSeconds: (this.total - this.tested) * this.rate,
      rate: this.rate,
    };
  }
}
