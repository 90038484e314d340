export {
  DECLINE_REASONS,
  Termination,
  declineMessage,
  isDeclineReason,
  isTermination,
} from '../../shared/types/index.js';
export type { DeclineReason, Verdict, VerdictReason } from '../../shared/types/index.js';

export { ChallengeAdmission } from './admission.js';
export type { AcceptHandlers, AcceptOutcome, AdmissionDecision, AdmissionOptions } from './admission.js';
export { Challenge, RATED_BONUS, TITLED_BONUS } from './challenge.js';
export { ConfigError, loadConfig, parseConfig } from './config.js';
export type { ChallengeMode, ChallengePolicy, SortMode } from './config.js';
export { Game, TEN_YEARS_MS } from './game.js';
export type { Color, GameOptions } from './game.js';
export { KeyedLock } from './keyed-lock.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { BOT_TITLE, Player } from './player.js';
export { ChallengeQueue } from './queue.js';
export { ExpiringTimer, systemClock } from './timer.js';
export type { Clock } from './timer.js';
export { RecentChallengeTracker } from './tracker.js';
export { RecordValidationError } from './validation.js';
