/**
 * Counts failed access-code attempts per remote address over a sliding
 * window. Only failures are recorded; a success clears the key.
 */
export class FailedAttemptLimiter {
  private readonly failures = new Map<string, number[]>();
  private sweepCounter = 0;

  constructor(
    private readonly limit: number,
    private readonly windowMs: number,
  ) {}

  isBlocked(key: string): boolean {
    if (this.limit <= 0) {
      return false;
    }
    return this.prune(key, Date.now()).length >= this.limit;
  }

  recordFailure(key: string): void {
    if (this.limit <= 0) {
      return;
    }
    const now = Date.now();
    if (++this.sweepCounter % 500 === 0) {
      this.sweep(now);
    }
    const timestamps = this.prune(key, now);
    timestamps.push(now);
    this.failures.set(key, timestamps);
  }

  clear(key: string): void {
    this.failures.delete(key);
  }

  private prune(key: string, now: number): number[] {
    const timestamps = this.failures.get(key) ?? [];
    while (timestamps.length > 0 && now - timestamps[0] >= this.windowMs) {
      timestamps.shift();
    }
    if (timestamps.length === 0) {
      this.failures.delete(key);
    }
    return timestamps;
  }

  private sweep(now: number) {
    for (const key of Array.from(this.failures.keys())) {
      this.prune(key, now);
    }
  }
}
