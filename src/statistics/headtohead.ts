// src/statistics/headtohead.ts

import { PreconditionError } from '../errors';
import type { Match } from '../models/match';
import type { Team } from '../models/team';
import { TeamStatistics } from './team';

/** A team's record against one specific opponent. */
export class HeadToHeadStatistics extends TeamStatistics {
  constructor(
    team: Team,
    readonly opponent: Team,
    matches: ReadonlyArray<Match>
  ) {
    super(team, matches);
    for (const m of matches) {
      if (m.opponentOf(team) !== opponent) {
        throw new PreconditionError(
          `HeadToHeadStatistics: ${opponent.name} must be the opponent in every match (${m.toString()})`,
          { team, opponent, match: m }
        );
      }
    }
  }
}
