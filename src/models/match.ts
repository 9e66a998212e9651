// src/models/match.ts

import { InvariantViolation, PreconditionError } from '../errors';
import { DEFAULT_TRANSFORM, type StrengthTransform } from '../ratings/transform';
import type { Result } from './result';
import type { Team } from './team';

/**
 * A fixture between two teams. Without a result it is a scheduled fixture;
 * with one it is terminal. Every change produces a new Match.
 */
export class Match {
  readonly kind = 'match' as const;
  readonly homeExpectedGoals: number;
  readonly awayExpectedGoals: number;

  constructor(
    readonly home: Team,
    readonly away: Team,
    readonly result?: Result,
    readonly transform: StrengthTransform = DEFAULT_TRANSFORM
  ) {
    if (home === away) {
      throw new InvariantViolation(`Match: ${home.name} cannot play itself`, { team: home });
    }
    this.homeExpectedGoals = transform.expectedGoals(home.attack - away.defense);
    this.awayExpectedGoals = transform.expectedGoals(away.attack - home.defense);
    Object.freeze(this);
  }

  get isPlayed(): boolean {
    return this.result !== undefined;
  }

  /** Home team on a home win, away team on an away win, undefined on a draw. */
  get winner(): Team | undefined {
    const r = this.requireResult('winner');
    if (r.isWin()) return this.home;
    if (r.isLoss()) return this.away;
    return undefined;
  }

  get loser(): Team | undefined {
    const r = this.requireResult('loser');
    if (r.isWin()) return this.away;
    if (r.isLoss()) return this.home;
    return undefined;
  }

  isWin(): boolean {
    return this.result?.isWin() ?? false;
  }

  isDraw(): boolean {
    return this.result?.isDraw() ?? false;
  }

  isLoss(): boolean {
    return this.result?.isLoss() ?? false;
  }

  involves(team: Team): boolean {
    return this.home === team || this.away === team;
  }

  opponentOf(team: Team): Team {
    if (team === this.home) return this.away;
    if (team === this.away) return this.home;
    throw new PreconditionError(`Match: ${team.name} is not a contestant in ${this.toString()}`, {
      team,
      match: this,
    });
  }

  goalsFor(team: Team): number {
    const r = this.requireResult('goalsFor');
    return this.opponentOf(team) === this.away ? r.homeGoals : r.awayGoals;
  }

  goalsAgainst(team: Team): number {
    const r = this.requireResult('goalsAgainst');
    return this.opponentOf(team) === this.away ? r.awayGoals : r.homeGoals;
  }

  withResult(result: Result): Match {
    if (this.result) {
      throw new PreconditionError(`Match: ${this.toString()} already has a result`, { match: this });
    }
    return new Match(this.home, this.away, result, this.transform);
  }

  /** Same fixture with home and away exchanged. Only for unplayed fixtures. */
  swapped(): Match {
    if (this.result) {
      throw new PreconditionError(`Match: cannot swap home/away of played match ${this.toString()}`, {
        match: this,
      });
    }
    return new Match(this.away, this.home, undefined, this.transform);
  }

  toString(): string {
    return `${this.home.name} ${this.result ? this.result.toString() : '-'} ${this.away.name}`;
  }

  private requireResult(what: string): Result {
    if (!this.result) {
      throw new PreconditionError(`Match.${what}: ${this.home.name} vs ${this.away.name} has not been played`, {
        match: this,
      });
    }
    return this.result;
  }
}
