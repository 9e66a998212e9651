// src/statistics/team.ts

import { PreconditionError } from '../errors';
import type { Match } from '../models/match';
import type { Team } from '../models/team';
import { div, requirePlayed } from './matches';

/** One team's record over a set of played matches it took part in. */
export class TeamStatistics {
  readonly numberOfMatches: number;
  readonly wins: number;
  readonly draws: number;
  readonly losses: number;
  readonly goalsScored: number;
  readonly goalsConceded: number;

  constructor(
    readonly team: Team,
    matches: ReadonlyArray<Match>
  ) {
    const played = requirePlayed(matches, 'TeamStatistics');
    for (const m of played) {
      if (!m.involves(team)) {
        throw new PreconditionError(
          `TeamStatistics: ${team.name} must be a contestant in every match (${m.toString()})`,
          { team, match: m }
        );
      }
    }

    let wins = 0, draws = 0, losses = 0, scored = 0, conceded = 0;
    for (const m of played) {
      const gf = m.goalsFor(team);
      const ga = m.goalsAgainst(team);
      if (gf > ga) wins++;
      else if (gf < ga) losses++;
      else draws++;
      scored += gf;
      conceded += ga;
    }

    this.numberOfMatches = played.length;
    this.wins = wins;
    this.draws = draws;
    this.losses = losses;
    this.goalsScored = scored;
    this.goalsConceded = conceded;
  }

  get winPercentage(): number { return div(this.wins, this.numberOfMatches); }
  get drawPercentage(): number { return div(this.draws, this.numberOfMatches); }
  get lossPercentage(): number { return div(this.losses, this.numberOfMatches); }

  get averageGoalsScored(): number { return div(this.goalsScored, this.numberOfMatches); }
  get averageGoalsConceded(): number { return div(this.goalsConceded, this.numberOfMatches); }
}
