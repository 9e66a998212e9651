// src/models/tournament.ts

import { InvariantViolation } from '../errors';
import { buildRoundRobinSchedule, type RoundRobinOptions } from '../pairings/roundrobin';
import { StandingsTable, type StandingsOptions } from '../standings/table';
import type { Match } from './match';
import type { Round } from './round';
import type { Team } from './team';

export interface TournamentOptions extends RoundRobinOptions, StandingsOptions {}

/**
 * A league: its schedule plus the standings history.
 * `standings[0]` is the all-zero table; once simulated, `standings[i]` is the
 * table after round i.
 */
export class Tournament {
  readonly kind = 'tournament' as const;
  readonly rounds: ReadonlyArray<Round>;
  readonly standings: ReadonlyArray<StandingsTable>;

  constructor(
    readonly teams: ReadonlyArray<Team>,
    rounds: ReadonlyArray<Round>,
    standings: ReadonlyArray<StandingsTable>
  ) {
    if (standings.length === 0) {
      throw new InvariantViolation('Tournament: standings history needs at least the initial table');
    }
    this.rounds = Object.freeze([...rounds]);
    this.standings = Object.freeze([...standings]);
    Object.freeze(this);
  }

  static create(teams: ReadonlyArray<Team>, options?: TournamentOptions): Tournament {
    const { tieBreak, points, ...schedule } = options ?? {};
    const rounds = buildRoundRobinSchedule(teams, schedule);
    const initial = StandingsTable.fromTeams(teams, { tieBreak, points });
    return new Tournament([...teams], rounds, [initial]);
  }

  get initialTable(): StandingsTable {
    const first = this.standings[0];
    if (!first) throw new InvariantViolation('Tournament: no standings');
    return first;
  }

  /** Latest standings snapshot. */
  get table(): StandingsTable {
    const last = this.standings[this.standings.length - 1];
    if (!last) throw new InvariantViolation('Tournament: no standings');
    return last;
  }

  get matches(): Match[] {
    return this.rounds.flatMap((r) => r.matches);
  }
}
