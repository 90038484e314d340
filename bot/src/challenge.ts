/**
 * Incoming challenges and the policy chain that decides whether to accept
 * them.
 */

import { ACCEPTED, declined, type DeclineReason, type Verdict } from '../../shared/types/decline.js';
import type { ChallengeMode, ChallengePolicy } from './config.js';
import { createLogger, errorContext } from './logger.js';
import { Player } from './player.js';
import type { RecentChallengeTracker } from './tracker.js';
import {
  challengeSchema,
  ownProfileSchema,
  requireRecord,
  type ChallengeRecord,
  type OwnProfile,
} from './validation.js';

const log = createLogger('Challenge');

export const RATED_BONUS = 200;
export const TITLED_BONUS = 200;

/** A check that must pass for the challenge to be accepted. */
type Requirement = readonly [met: () => boolean, reason: DeclineReason];

export class Challenge {
  readonly id: string;
  readonly isRated: boolean;
  readonly variantKey: string;
  readonly performanceCategory: string;
  readonly speedCategory: string;
  readonly incrementSeconds?: number;
  readonly baseSeconds?: number;
  readonly daysPerTurn?: number;
  readonly challenger: Player;
  /** Intended recipient; an empty profile for open challenges. */
  readonly opponent: Player;
  /** True when we sent this challenge ourselves. */
  readonly isSelfInitiated: boolean;

  constructor(info: ChallengeRecord, profile: OwnProfile) {
    this.id = info.id;
    this.isRated = info.rated;
    this.variantKey = info.variant.key;
    this.performanceCategory = info.perf.name;
    this.speedCategory = info.speed;
    this.incrementSeconds = info.timeControl?.increment ?? undefined;
    this.baseSeconds = info.timeControl?.limit ?? undefined;
    this.daysPerTurn = info.timeControl?.daysPerTurn ?? undefined;
    this.challenger = new Player(info.challenger ?? {});
    this.opponent = new Player(info.destUser ?? {});
    this.isSelfInitiated = this.challenger.name === profile.username;
  }

  /**
   * Build a challenge from untrusted payloads.
   * Throws RecordValidationError if either record is malformed.
   */
  static fromRecord(challengeInfo: unknown, userProfile: unknown): Challenge {
    const info = requireRecord(challengeSchema, challengeInfo, 'challenge');
    const profile = requireRecord(ownProfileSchema, userProfile, 'profile');
    return new Challenge(info, profile);
  }

  get mode(): ChallengeMode {
    return this.isRated ? 'rated' : 'casual';
  }

  // -------------------------------------------------------------------------
  // Policy checks
  // -------------------------------------------------------------------------

  isSupportedVariant(policy: ChallengePolicy): boolean {
    return policy.variants.includes(this.variantKey);
  }

  isSupportedTimeControl(policy: ChallengePolicy): boolean {
    if (!policy.timeControls.includes(this.speedCategory)) {
      return false;
    }

    if (this.baseSeconds !== undefined && this.incrementSeconds !== undefined) {
      return (
        within(this.incrementSeconds, policy.minIncrement, policy.maxIncrement) &&
        within(this.baseSeconds, policy.minBase, policy.maxBase)
      );
    }
    if (this.daysPerTurn !== undefined) {
      return within(this.daysPerTurn, policy.minDays, policy.maxDays);
    }
    // Unlimited: only when days per turn is unbounded too.
    return policy.maxDays === Number.POSITIVE_INFINITY;
  }

  isSupportedMode(policy: ChallengePolicy): boolean {
    return policy.modes.includes(this.mode);
  }

  /** Human challengers are never rate limited. */
  isSupportedRecent(policy: ChallengePolicy, tracker: RecentChallengeTracker): boolean {
    return !this.challenger.isBot || tracker.check(this.challenger.name, policy.maxRecentBotChallenges);
  }

  /**
   * Decide whether to accept this challenge.
   *
   * Checks run in a fixed order and the first failing one supplies the
   * decline reason. Never throws: an error while checking declines with
   * `generic`.
   */
  evaluate(policy: ChallengePolicy, tracker: RecentChallengeTracker): Verdict {
    try {
      if (this.isSelfInitiated) {
        return ACCEPTED;
      }

      const name = this.challenger.name;
      const requirements: Requirement[] = [
        [() => policy.acceptBot || !this.challenger.isBot, 'noBot'],
        [() => !policy.onlyBot || this.challenger.isBot, 'onlyBot'],
        [() => this.isSupportedTimeControl(policy), 'timeControl'],
        [() => this.isSupportedVariant(policy), 'variant'],
        [() => this.isSupportedMode(policy), this.isRated ? 'casual' : 'rated'],
        [() => !policy.blockList.includes(name), 'generic'],
        [() => isAllowed(name, policy.allowList), 'generic'],
        [() => this.isSupportedRecent(policy, tracker), 'later'],
      ];

      for (const [met, reason] of requirements) {
        if (!met()) return declined(reason);
      }
      return ACCEPTED;
    } catch (error) {
      log.error(`Error while checking challenge ${this.id}`, errorContext(error));
      return declined('generic');
    }
  }

  /** Priority among pending challenges; higher is accepted first. */
  score(): number {
    const ratedBonus = this.isRated ? RATED_BONUS : 0;
    const titledBonus = this.challenger.title && !this.challenger.isBot ? TITLED_BONUS : 0;
    return (this.challenger.rating ?? 0) + ratedBonus + titledBonus;
  }

  toString(): string {
    return `${this.performanceCategory} ${this.mode} challenge from ${this.challenger} (${this.id})`;
  }
}

function within(value: number, min: number, max: number): boolean {
  return min <= value && value <= max;
}

/** An allow list with no non-empty entries allows everyone. */
function isAllowed(name: string, allowList: readonly string[]): boolean {
  const allowed = allowList.filter(Boolean);
  return allowed.length === 0 || allowed.includes(name);
}
