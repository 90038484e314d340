/**
 * Challenge verdict types.
 *
 * The reason tags are the exact strings the game server accepts as a
 * decline reason, so anything keyed on them (decline requests, log
 * dashboards) must keep using these values verbatim.
 */

// ---------------------------------------------------------------------------
// Decline reasons
// ---------------------------------------------------------------------------

export const DECLINE_REASONS = [
  'noBot',
  'onlyBot',
  'timeControl',
  'variant',
  'casual',
  'rated',
  'generic',
  'later',
] as const;

export type DeclineReason = (typeof DECLINE_REASONS)[number];

/** Reason attached to a verdict: empty when the challenge was accepted. */
export type VerdictReason = DeclineReason | '';

export type Verdict =
  | { accepted: true; reason: '' }
  | { accepted: false; reason: DeclineReason };

export const ACCEPTED: Verdict = { accepted: true, reason: '' };

export function declined(reason: DeclineReason): Verdict {
  return { accepted: false, reason };
}

const REASON_TAGS: readonly string[] = DECLINE_REASONS;

export function isDeclineReason(value: unknown): value is DeclineReason {
  return typeof value === 'string' && REASON_TAGS.includes(value);
}

// ---------------------------------------------------------------------------
// Human-readable messages
// ---------------------------------------------------------------------------

const DECLINE_MESSAGES: Record<DeclineReason, string> = {
  noBot: "I'm not accepting challenges from bots.",
  onlyBot: "I'm only accepting challenges from bots.",
  timeControl: "I'm not accepting challenges with this time control.",
  variant: 'This variant is not accepted.',
  casual: 'Please send me a casual challenge instead.',
  rated: 'Please send me a rated challenge instead.',
  generic: "I'm not accepting challenges at the moment.",
  later: "I'm not accepting challenges right now, please ask again later.",
};

export function declineMessage(reason: VerdictReason): string {
  return reason === '' ? '' : DECLINE_MESSAGES[reason];
}
