/**
 * Shared builders for challenge, game and policy test data.
 */

import { Challenge } from '../challenge.js';
import { parseConfig, type ChallengePolicy } from '../config.js';
import type { Clock } from '../timer.js';
import type { ChallengeRecord, ProfileRecord } from '../validation.js';

export const OWN_USERNAME = 'gatekeeper-bot';
export const OWN_PROFILE = { username: OWN_USERNAME };

export const CAROL: ProfileRecord = { name: 'carol', rating: 1800 };

export function botProfile(name: string, rating = 2000): ProfileRecord {
  return { name, title: 'BOT', rating };
}

/** Rated standard blitz 3+3 from carol. */
export function challengeRecord(overrides: Partial<ChallengeRecord> = {}): ChallengeRecord {
  return {
    id: 'c1',
    rated: true,
    variant: { key: 'standard' },
    perf: { name: 'Blitz' },
    speed: 'blitz',
    timeControl: { increment: 3, limit: 180 },
    challenger: CAROL,
    ...overrides,
  };
}

export function makeChallenge(overrides: Partial<ChallengeRecord> = {}): Challenge {
  return new Challenge(challengeRecord(overrides), OWN_PROFILE);
}

/** Standard blitz, 0-5s increment, 60-300s base, both modes, bots welcome. */
export function makePolicy(overrides: Record<string, unknown> = {}): ChallengePolicy {
  return parseConfig({
    variants: ['standard'],
    timeControls: ['blitz'],
    minIncrement: 0,
    maxIncrement: 5,
    minBase: 60,
    maxBase: 300,
    modes: ['rated', 'casual'],
    acceptBot: true,
    onlyBot: false,
    blockList: [],
    allowList: [],
    ...overrides,
  });
}

/** Manually advanced clock. */
export class FakeClock {
  private current = 0;

  readonly now: Clock = () => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}
