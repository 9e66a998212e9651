// src/models/result.ts

import { GoalsSchema, parseConfig } from '../config';

/** Full-time scoreline. Value type: compare with `equals` or `key`, not `===`. */
export class Result {
  readonly homeGoals: number;
  readonly awayGoals: number;

  constructor(homeGoals: number, awayGoals: number) {
    this.homeGoals = parseConfig(GoalsSchema, homeGoals, 'Result.homeGoals');
    this.awayGoals = parseConfig(GoalsSchema, awayGoals, 'Result.awayGoals');
    Object.freeze(this);
  }

  /** Stable value key, e.g. "3-1". */
  get key(): string {
    return `${this.homeGoals}-${this.awayGoals}`;
  }

  isWin(): boolean {
    return this.homeGoals > this.awayGoals;
  }

  isDraw(): boolean {
    return this.homeGoals === this.awayGoals;
  }

  isLoss(): boolean {
    return this.homeGoals < this.awayGoals;
  }

  equals(other: Result): boolean {
    return this.homeGoals === other.homeGoals && this.awayGoals === other.awayGoals;
  }

  toString(): string {
    return `${this.homeGoals} - ${this.awayGoals}`;
  }
}
