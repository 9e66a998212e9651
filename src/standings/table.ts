// src/standings/table.ts
// League table: fold batches of results into per-team rows, then re-rank.

import { parseConfig, PointsConfigSchema, type PointsConfig, type ResolvedPoints } from '../config';
import { ConfigurationError, InvariantViolation } from '../errors';
import type { Match } from '../models/match';
import type { Team } from '../models/team';

export interface StandingsRow {
  readonly team: Team;
  readonly wins: number;
  readonly draws: number;
  readonly losses: number;
  readonly goalsScored: number;
  readonly goalsConceded: number;
  readonly matchesPlayed: number;
  readonly goalsDifference: number;
  readonly points: number;
  /** 1-based rank */
  readonly position: number;
}

/**
 * Ordering policy. Rows are ranked by `key`, compared element by element,
 * larger first.
 */
export interface TieBreakPolicy {
  key(row: StandingsRow): ReadonlyArray<number>;
}

/** Points, then goal difference, then goals scored. */
export const DEFAULT_TIE_BREAK: TieBreakPolicy = {
  key: (r) => [r.points, r.goalsDifference, r.goalsScored],
};

export interface StandingsOptions {
  tieBreak?: TieBreakPolicy;
  points?: PointsConfig;
}

// ---------- deltas ----------
interface Delta {
  wins: number;
  draws: number;
  losses: number;
  goalsScored: number;
  goalsConceded: number;
}

const zero = (): Delta => ({ wins: 0, draws: 0, losses: 0, goalsScored: 0, goalsConceded: 0 });

function addDelta(map: Map<Team, Delta>, team: Team, scored: number, conceded: number) {
  let d = map.get(team);
  if (!d) map.set(team, (d = zero()));
  if (scored > conceded) d.wins++;
  else if (scored < conceded) d.losses++;
  else d.draws++;
  d.goalsScored += scored;
  d.goalsConceded += conceded;
}

function makeRow(team: Team, t: Delta, pt: ResolvedPoints, position: number): StandingsRow {
  const matchesPlayed = t.wins + t.draws + t.losses;
  return Object.freeze({
    team,
    ...t,
    matchesPlayed,
    goalsDifference: t.goalsScored - t.goalsConceded,
    points: pt.win * t.wins + pt.draw * t.draws + pt.loss * t.losses,
    position,
  });
}

function compareKeys(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
  const len = Math.max(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return y - x;
  }
  return 0;
}

/** Stable sort by the policy key, then assign 1-based positions. */
function rank(rows: ReadonlyArray<StandingsRow>, tieBreak: TieBreakPolicy): StandingsRow[] {
  // Array.prototype.sort is stable
  const keyed = rows.map((row) => ({ row, key: tieBreak.key(row) }));
  keyed.sort((a, b) => compareKeys(a.key, b.key));
  return keyed.map(({ row }, idx) => Object.freeze({ ...row, position: idx + 1 }));
}

export class StandingsTable {
  readonly rows: ReadonlyArray<StandingsRow>;

  private constructor(
    rows: ReadonlyArray<StandingsRow>,
    readonly tieBreak: TieBreakPolicy,
    private readonly points: ResolvedPoints
  ) {
    this.rows = Object.freeze([...rows]);
    Object.freeze(this);
  }

  /** All-zero table, ranked by the policy; exact ties follow the order of `teams`. */
  static fromTeams(teams: ReadonlyArray<Team>, options?: StandingsOptions): StandingsTable {
    const { tieBreak = DEFAULT_TIE_BREAK, points } = options ?? {};
    const pt = parseConfig(PointsConfigSchema, points, 'StandingsTable.fromTeams');
    if (teams.length < 2) {
      throw new ConfigurationError(`StandingsTable: need at least two teams, got ${teams.length}`);
    }
    if (new Set(teams).size !== teams.length) {
      throw new ConfigurationError('StandingsTable: the same team was listed more than once');
    }
    const rows = teams.map((team, i) => makeRow(team, zero(), pt, i + 1));
    return new StandingsTable(rank(rows, tieBreak), tieBreak, pt);
  }

  get teams(): Team[] {
    return this.rows.map((r) => r.team);
  }

  rowOf(team: Team): StandingsRow {
    const row = this.rows.find((r) => r.team === team);
    if (!row) {
      throw new InvariantViolation(`StandingsTable: ${team.name} is not in the table`, { team });
    }
    return row;
  }

  /**
   * New table with the results of `matches` folded in. Unplayed matches are
   * ignored. Exact ties keep their previous relative order.
   */
  update(matches: ReadonlyArray<Match>): StandingsTable {
    const deltas = new Map<Team, Delta>();
    for (const m of matches) {
      if (!m.result) continue;
      addDelta(deltas, m.home, m.result.homeGoals, m.result.awayGoals);
      addDelta(deltas, m.away, m.result.awayGoals, m.result.homeGoals);
    }

    const known = new Set(this.teams);
    for (const team of deltas.keys()) {
      if (!known.has(team)) {
        throw new InvariantViolation(`StandingsTable.update: ${team.name} is not in the table`, { team });
      }
    }

    const folded = this.rows.map((row) => {
      const d = deltas.get(row.team) ?? zero();
      return makeRow(
        row.team,
        {
          wins: row.wins + d.wins,
          draws: row.draws + d.draws,
          losses: row.losses + d.losses,
          goalsScored: row.goalsScored + d.goalsScored,
          goalsConceded: row.goalsConceded + d.goalsConceded,
        },
        this.points,
        row.position
      );
    });

    return new StandingsTable(rank(folded, this.tieBreak), this.tieBreak, this.points);
  }
}
