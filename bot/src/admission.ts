/**
 * Challenge admission controller.
 *
 * Long-lived owner of the challenge policy and the recent-challenge tracker:
 *   1. consider()   — parse an incoming challenge, evaluate it, queue it if accepted
 *   2. acceptNext() — pop the best queued challenge and accept it, re-checking
 *                     the bot rate limit under a per-challenger lock
 *   3. startSweeper() — optionally drop stale tracker entries on an interval
 */

import { declineMessage, type DeclineReason, type Verdict } from '../../shared/types/decline.js';
import { Challenge } from './challenge.js';
import type { ChallengePolicy } from './config.js';
import { KeyedLock } from './keyed-lock.js';
import { createLogger } from './logger.js';
import { ChallengeQueue } from './queue.js';
import { systemClock, type Clock } from './timer.js';
import { RecentChallengeTracker } from './tracker.js';

const log = createLogger('Admission');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AdmissionOptions {
  /** Our own account name. */
  username: string;
  policy: ChallengePolicy;
  tracker?: RecentChallengeTracker;
  clock?: Clock;
}

export type AdmissionDecision = Verdict & {
  challenge: Challenge;
  /** Text to show the challenger; empty when accepted. */
  message: string;
};

/** Calls out to the server; supplied by the transport layer. */
export interface AcceptHandlers {
  accept(challenge: Challenge): Promise<void>;
  decline(challenge: Challenge, reason: DeclineReason): Promise<void>;
}

export type AcceptOutcome =
  | { accepted: true; challenge: Challenge }
  | { accepted: false; challenge: Challenge; reason: DeclineReason };

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export class ChallengeAdmission {
  readonly policy: ChallengePolicy;
  readonly tracker: RecentChallengeTracker;
  readonly queue: ChallengeQueue;
  private readonly username: string;
  private readonly lock = new KeyedLock();
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(options: AdmissionOptions) {
    this.username = options.username;
    this.policy = options.policy;
    this.tracker = options.tracker ?? new RecentChallengeTracker(options.clock ?? systemClock);
    this.queue = new ChallengeQueue(options.policy.sortBy);
  }

  private get windowMs(): number {
    return this.policy.recentBotChallengeAgeSeconds * 1000;
  }

  /**
   * Evaluate an incoming challenge payload.
   * Accepted challenges from others are queued; our own are not.
   * Throws RecordValidationError if the payload is malformed.
   */
  consider(challengeInfo: unknown): AdmissionDecision {
    const challenge = Challenge.fromRecord(challengeInfo, { username: this.username });
    const verdict = challenge.evaluate(this.policy, this.tracker);

    if (!verdict.accepted) {
      log.info(`Declining ${challenge}`, { reason: verdict.reason });
    } else if (challenge.isSelfInitiated) {
      log.info(`Own ${challenge}`);
    } else {
      this.queue.push(challenge);
      log.info(`Queued ${challenge}`, { score: challenge.score(), queued: this.queue.size });
    }

    return { ...verdict, challenge, message: declineMessage(verdict.reason) };
  }

  /** Forget a queued challenge the challenger withdrew. */
  cancel(challengeId: string): boolean {
    const removed = this.queue.remove(challengeId);
    if (removed) log.info('Challenge withdrawn', { id: challengeId });
    return removed;
  }

  /**
   * Accept the next queued challenge.
   *
   * Bot challengers are re-checked against the rate limit and the acceptance
   * is recorded only after `accept` resolves. Both happen while holding the
   * challenger's lock, so two acceptances from the same bot can't both slip
   * under the limit. Errors from the handlers propagate.
   */
  async acceptNext(handlers: AcceptHandlers): Promise<AcceptOutcome | undefined> {
    const challenge = this.queue.pop();
    if (!challenge) return undefined;

    const { challenger } = challenge;
    return this.lock.runExclusive(challenger.name, async (): Promise<AcceptOutcome> => {
      if (challenger.isBot && !this.tracker.check(challenger.name, this.policy.maxRecentBotChallenges)) {
        log.info(`Declining ${challenge}`, { reason: 'later', recent: this.tracker.count(challenger.name) });
        await handlers.decline(challenge, 'later');
        return { accepted: false, challenge, reason: 'later' };
      }

      log.info(`Accepting ${challenge}`);
      await handlers.accept(challenge);
      if (challenger.isBot) {
        this.tracker.record(challenger.name, this.windowMs);
      }
      return { accepted: true, challenge };
    });
  }

  /**
   * Periodically drop challengers whose timers have all expired.
   * Returns false when no interval is given or configured.
   */
  startSweeper(intervalMs: number | undefined = this.policy.sweepIntervalMs): boolean {
    if (intervalMs === undefined) return false;
    this.stop();
    this.sweeper = setInterval(() => {
      const dropped = this.tracker.sweep();
      if (dropped > 0) log.info('Swept stale challengers', { dropped, tracked: this.tracker.size });
    }, intervalMs);
    this.sweeper.unref();
    return true;
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }
}
