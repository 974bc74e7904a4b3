/**
 * Rate limiter for audio-level broadcasts. Frames arrive at 50/s; the display only
 * needs a handful of updates per second.
 */
export class LevelThrottle {
  private readonly intervalMs: number;
  private lastEmitAt: number | null = null;

  constructor(updatesPerSecond: number) {
    this.intervalMs = 1000 / Math.max(1, updatesPerSecond);
  }

  /**
   * Returns true when an update may be sent at `now`, and records it
   */
  tryAcquire(now: number): boolean {
    if (this.lastEmitAt !== null && now - this.lastEmitAt < this.intervalMs) {
      return false;
    }
    this.lastEmitAt = now;
    return true;
  }
}
