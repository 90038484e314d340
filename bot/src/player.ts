import type { ProfileRecord } from './validation.js';

/** Title the server gives to bot accounts. */
export const BOT_TITLE = 'BOT';

/** Shown in place of a rating the server did not send. */
export const NO_RATING = 'None';

/**
 * Public profile of one side of a challenge or game.
 */
export class Player {
  readonly name: string;
  readonly title?: string;
  readonly rating?: number;
  readonly isProvisionalRating?: boolean;
  /** Strength of the server's built-in AI; only set for AI opponents. */
  readonly aiStrengthLevel?: number;

  constructor(info: ProfileRecord = {}) {
    this.name = info.name ?? '';
    this.title = info.title ?? undefined;
    this.rating = info.rating ?? undefined;
    this.isProvisionalRating = info.provisional ?? undefined;
    this.aiStrengthLevel = info.aiLevel ?? undefined;
  }

  get isBot(): boolean {
    return this.title === BOT_TITLE;
  }

  toString(): string {
    // Level 0 is still an AI opponent
    if (this.aiStrengthLevel !== undefined) {
      return `AI level ${this.aiStrengthLevel}`;
    }
    const rating = `${this.rating ?? NO_RATING}${this.isProvisionalRating ? '?' : ''}`;
    return `${this.title ?? ''} ${this.name} (${rating})`.trim();
  }
}
