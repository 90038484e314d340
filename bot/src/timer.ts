/**
 * Expiring timers measured against an injectable clock.
 */

/** Returns the current time in milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Knows whether a fixed duration has elapsed since it was created or last
 * reset. Expiry is computed on read; nothing is scheduled.
 */
export class ExpiringTimer {
  private startedAt: number;

  constructor(
    readonly durationMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    this.startedAt = clock();
  }

  isExpired(): boolean {
    return this.timeSinceReset() >= this.durationMs;
  }

  reset(): void {
    this.startedAt = this.clock();
  }

  timeSinceReset(): number {
    return this.clock() - this.startedAt;
  }

  /** Milliseconds left before expiry, never negative. */
  timeUntilExpiration(): number {
    return Math.max(0, this.durationMs - this.timeSinceReset());
  }
}
