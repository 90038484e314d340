import type { Challenge } from './challenge.js';
import type { SortMode } from './config.js';

interface QueuedChallenge {
  challenge: Challenge;
  arrival: number;
}

/**
 * Challenges waiting to be accepted.
 *
 * `best` pops the highest score, breaking ties by earliest arrival.
 * `first` pops in arrival order.
 */
export class ChallengeQueue {
  private entries: QueuedChallenge[] = [];
  private arrivals = 0;

  constructor(readonly sortBy: SortMode = 'best') {}

  /** Adds a challenge; a challenge already queued keeps its place. */
  push(challenge: Challenge): void {
    if (this.has(challenge.id)) return;
    this.entries.push({ challenge, arrival: this.arrivals++ });
  }

  has(id: string): boolean {
    return this.entries.some((entry) => entry.challenge.id === id);
  }

  /** Drop a challenge cancelled before we got to it. */
  remove(id: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.challenge.id !== id);
    return this.entries.length !== before;
  }

  pop(): Challenge | undefined {
    if (this.entries.length === 0) return undefined;

    let index = 0;
    if (this.sortBy === 'best') {
      // Entries are in arrival order, so strict > keeps the earliest on ties
      for (let i = 1; i < this.entries.length; i++) {
        if (this.entries[i].challenge.score() > this.entries[index].challenge.score()) {
          index = i;
        }
      }
    }
    const [entry] = this.entries.splice(index, 1);
    return entry.challenge;
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }
}
