// src/statistics/matches.ts

import { InsufficientDataError, PreconditionError } from '../errors';
import type { Match } from '../models/match';
import type { Result } from '../models/result';

export interface ResultFrequency {
  result: Result;
  count: number;
  probability: number;
}

export type PlayedMatch = Match & { readonly result: Result };

/** Ratio that reads 0 over an empty denominator. */
export const div = (n: number, d: number) => (d > 0 ? n / d : 0);

export const isPlayed = (m: Match): m is PlayedMatch => m.result !== undefined;

/** Checks that `matches` is non-empty and fully played. */
export function requirePlayed(matches: ReadonlyArray<Match>, where: string): PlayedMatch[] {
  if (matches.length === 0) {
    throw new InsufficientDataError(`${where}: at least one match is required`);
  }
  return matches.map((m) => {
    if (!isPlayed(m)) {
      throw new PreconditionError(`${where}: ${m.toString()} has not been played`, { match: m });
    }
    return m;
  });
}

/** Aggregates over any set of played matches, from the home side's perspective. */
export class MatchStatistics {
  readonly numberOfMatches: number;
  readonly wins: number;
  readonly draws: number;
  readonly losses: number;
  readonly homeGoals: number;
  readonly awayGoals: number;
  /** Most frequent scoreline first. */
  readonly resultsFrequency: ReadonlyArray<ResultFrequency>;

  constructor(matches: ReadonlyArray<Match>) {
    const played = requirePlayed(matches, 'MatchStatistics');
    this.numberOfMatches = played.length;

    let wins = 0, draws = 0, losses = 0, homeGoals = 0, awayGoals = 0;
    const freq = new Map<string, { result: Result; count: number }>();
    for (const { result } of played) {
      if (result.isWin()) wins++;
      else if (result.isLoss()) losses++;
      else draws++;
      homeGoals += result.homeGoals;
      awayGoals += result.awayGoals;

      const entry = freq.get(result.key);
      if (entry) entry.count++;
      else freq.set(result.key, { result, count: 1 });
    }

    this.wins = wins;
    this.draws = draws;
    this.losses = losses;
    this.homeGoals = homeGoals;
    this.awayGoals = awayGoals;
    this.resultsFrequency = [...freq.values()]
      .sort((a, b) => b.count - a.count)
      .map((e) => ({ ...e, probability: e.count / played.length }));
  }

  get winPercentage(): number { return div(this.wins, this.numberOfMatches); }
  get drawPercentage(): number { return div(this.draws, this.numberOfMatches); }
  get lossPercentage(): number { return div(this.losses, this.numberOfMatches); }

  get totalGoals(): number { return this.homeGoals + this.awayGoals; }
  get averageHomeGoals(): number { return div(this.homeGoals, this.numberOfMatches); }
  get averageAwayGoals(): number { return div(this.awayGoals, this.numberOfMatches); }
  get averageTotalGoals(): number { return div(this.totalGoals, this.numberOfMatches); }

  /** Share of matches that ended with exactly this scoreline. */
  probabilityOf(result: Result): number {
    return this.resultsFrequency.find((e) => e.result.equals(result))?.probability ?? 0;
  }
}
