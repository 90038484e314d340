import { ExpiringTimer, systemClock, type Clock } from './timer.js';

/**
 * Recently accepted challenges per challenger, one timer per acceptance.
 *
 * Expired timers are pruned lazily whenever a challenger's entry is read, and
 * a challenger whose timers have all expired is dropped from the map. Keys
 * that are never read again stay until {@link sweep} runs.
 */
export class RecentChallengeTracker {
  private readonly timers = new Map<string, ExpiringTimer[]>();

  constructor(private readonly clock: Clock = systemClock) {}

  /** Remember one accepted challenge from `challenger` for `windowMs`. */
  record(challenger: string, windowMs: number): void {
    const timer = new ExpiringTimer(windowMs, this.clock);
    const existing = this.prune(challenger);
    this.timers.set(challenger, [...existing, timer]);
  }

  /** Number of unexpired acceptances for `challenger`. */
  count(challenger: string): number {
    return this.prune(challenger).length;
  }

  /**
   * True if another challenge from `challenger` may be accepted.
   * An undefined `maxAllowed` means no limit.
   */
  check(challenger: string, maxAllowed: number | undefined): boolean {
    const remaining = this.prune(challenger).length;
    return maxAllowed === undefined || remaining < maxAllowed;
  }

  /** Prune every challenger. Returns the number of challengers dropped. */
  sweep(): number {
    let dropped = 0;
    for (const challenger of [...this.timers.keys()]) {
      if (this.prune(challenger).length === 0) dropped++;
    }
    return dropped;
  }

  /** Number of challengers currently tracked. */
  get size(): number {
    return this.timers.size;
  }

  private prune(challenger: string): ExpiringTimer[] {
    const timers = this.timers.get(challenger);
    if (!timers) return [];

    const live = timers.filter((timer) => !timer.isExpired());
    if (live.length === 0) {
      this.timers.delete(challenger);
    } else if (live.length !== timers.length) {
      this.timers.set(challenger, live);
    }
    return live;
  }
}
