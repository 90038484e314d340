export type { DeclineReason, VerdictReason, Verdict } from './decline.js';
export { DECLINE_REASONS, ACCEPTED, declined, isDeclineReason, declineMessage } from './decline.js';
export { Termination, isTermination } from './termination.js';
