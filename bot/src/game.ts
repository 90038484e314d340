import { isTermination, type Termination } from '../../shared/types/termination.js';
import type { ChallengeMode } from './config.js';
import { Player } from './player.js';
import { ExpiringTimer, systemClock, type Clock } from './timer.js';
import { gameSchema, requireRecord, type GameRecord } from './validation.js';

/** Stand-in initial clock for games without a real clock. */
export const TEN_YEARS_MS = 1000 * 3600 * 24 * 365 * 10;

export const DEFAULT_BASE_URL = 'https://lichess.org/';
export const DEFAULT_ABORT_TIME_SECONDS = 20;

export type Color = 'white' | 'black';

export interface GameOptions {
  /** Our own account name. */
  username: string;
  baseUrl?: string;
  /** How long to wait for the opponent's first move before aborting. */
  abortTimeSeconds?: number;
  clock?: Clock;
}

/**
 * Snapshot of a game as reported when it starts.
 */
export class Game {
  readonly username: string;
  readonly id: string;
  readonly speedCategory?: string;
  readonly clockInitialMs: number;
  readonly clockIncrementMs: number;
  readonly performanceCategory: string;
  readonly variantName: string;
  readonly mode: ChallengeMode;
  readonly white: Player;
  readonly black: Player;
  readonly initialFen: string;
  readonly isWhite: boolean;
  readonly myColor: Color;
  readonly opponentColor: Color;
  readonly opponent: Player;
  readonly baseUrl: string;
  /** Set once the game has finished in one of the known ways. */
  readonly termination?: Termination;
  readonly abortTimer: ExpiringTimer;

  constructor(info: GameRecord, options: GameOptions) {
    this.username = options.username;
    this.id = info.id;
    this.speedCategory = info.speed ?? undefined;
    this.clockInitialMs = info.clock?.initial ?? TEN_YEARS_MS;
    this.clockIncrementMs = info.clock?.increment ?? 0;
    this.performanceCategory = info.perf?.name ?? '{perf?}';
    this.variantName = info.variant.name;
    this.mode = info.rated ? 'rated' : 'casual';
    this.white = new Player(info.white ?? {});
    this.black = new Player(info.black ?? {});
    this.initialFen = info.initialFen ?? 'startpos';

    this.isWhite = this.white.name.toLowerCase() === options.username.toLowerCase();
    this.myColor = this.isWhite ? 'white' : 'black';
    this.opponentColor = this.isWhite ? 'black' : 'white';
    this.opponent = this.isWhite ? this.black : this.white;

    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    const status = info.state?.status;
    this.termination = isTermination(status) ? status : undefined;

    const abortSeconds = options.abortTimeSeconds ?? DEFAULT_ABORT_TIME_SECONDS;
    this.abortTimer = new ExpiringTimer(abortSeconds * 1000, options.clock ?? systemClock);
  }

  /**
   * Build a game from an untrusted payload.
   * Throws RecordValidationError if `id` or `variant.name` is missing.
   */
  static fromRecord(gameInfo: unknown, options: GameOptions): Game {
    return new Game(requireRecord(gameSchema, gameInfo, 'game'), options);
  }

  /** Link to the game from our side of the board. */
  url(): string {
    return new URL(`${this.id}/${this.myColor}`, this.baseUrl).toString();
  }

  shortUrl(): string {
    return new URL(this.id, this.baseUrl).toString();
  }

  /** A game may be aborted until both sides have moved. */
  isAbortable(plyCount: number): boolean {
    return plyCount < 2;
  }

  shouldAbortNow(plyCount: number): boolean {
    return this.isAbortable(plyCount) && this.abortTimer.isExpired();
  }

  toString(): string {
    return `${this.url()} ${this.performanceCategory} vs ${this.opponent} (${this.id})`;
  }
}
