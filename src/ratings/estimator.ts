// src/ratings/estimator.ts
// Attack/defense ratings recovered from observed scorelines through the inverse
// expected-goals transform.

import { InsufficientDataError } from '../errors';
import type { Match } from '../models/match';
import { Team } from '../models/team';
import { HeadToHeadStatistics } from '../statistics/headtohead';
import { isPlayed, type PlayedMatch } from '../statistics/matches';
import { TeamStatistics } from '../statistics/team';
import { DEFAULT_TRANSFORM, type StrengthTransform } from './transform';

export interface EstimateTeamOptions {
  transform?: StrengthTransform;
  /**
   * Latest ratings for opponents, keyed by the instances that appear in the
   * matches. Opponents missing here are taken at their own ratings.
   */
  ratings?: ReadonlyMap<Team, Team>;
}

export interface EstimateStrengthsOptions {
  transform?: StrengthTransform;
  /** Teams to rate. Default: every team that appears in a played match. */
  teams?: ReadonlyArray<Team>;
}

interface Sample {
  count: number;
  averageScored: number;
  averageConceded: number;
}

interface Rating {
  attack: number;
  defense: number;
}

const ANCHOR_NAME = '(anchor)';

/** A zero average over k matches becomes 1/(k+1) so the log stays defined. */
const orSubstitute = (average: number, count: number) => (average > 0 ? average : 1 / (count + 1));

/** Rating implied by a sample of results against an opponent of known rating. */
function implied(transform: StrengthTransform, opponent: Rating, s: Sample): Rating {
  return {
    attack: opponent.defense + transform.strengthDiff(orSubstitute(s.averageScored, s.count)),
    defense: opponent.attack - transform.strengthDiff(orSubstitute(s.averageConceded, s.count)),
  };
}

function median(values: ReadonlyArray<number>): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const hi = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return hi;
  return ((sorted[mid - 1] ?? hi) + hi) / 2;
}

function playedBy(team: Team, matches: ReadonlyArray<PlayedMatch>, where: string): PlayedMatch[] {
  const own = matches.filter((m) => m.involves(team));
  if (own.length === 0) {
    throw new InsufficientDataError(`${where}: no played matches for ${team.name}`, { team });
  }
  return own;
}

/**
 * Estimate one team from its results against each opponent.
 *
 * Per opponent, average goals scored/conceded are mapped through the inverse
 * transform relative to the opponent's current rating; the per-opponent
 * estimates are then combined, weighted by number of matches.
 * Returns a new Team with the same name.
 */
export function estimateTeam(
  team: Team,
  matches: ReadonlyArray<Match>,
  options?: EstimateTeamOptions
): Team {
  const { transform = DEFAULT_TRANSFORM, ratings } = options ?? {};
  const own = playedBy(team, matches.filter(isPlayed), 'estimateTeam');

  const byOpponent = new Map<Team, PlayedMatch[]>();
  for (const m of own) {
    const opp = m.opponentOf(team);
    let list = byOpponent.get(opp);
    if (!list) byOpponent.set(opp, (list = []));
    list.push(m);
  }

  let attack = 0, defense = 0, weight = 0;
  for (const [opp, ms] of byOpponent) {
    const h2h = new HeadToHeadStatistics(team, opp, ms);
    const est = implied(transform, ratings?.get(opp) ?? opp, {
      count: h2h.numberOfMatches,
      averageScored: h2h.averageGoalsScored,
      averageConceded: h2h.averageGoalsConceded,
    });
    attack += est.attack * h2h.numberOfMatches;
    defense += est.defense * h2h.numberOfMatches;
    weight += h2h.numberOfMatches;
  }

  return new Team(team.name, attack / weight, defense / weight);
}

/**
 * Estimate a whole universe of teams with no prior ratings.
 *
 * Everyone is first rated against a synthetic anchor built from the median
 * team (median average goals for/against, median sample size), which centres
 * the scale on that median team. Then each team is re-estimated once, weakest
 * first, against the latest ratings of the others. One pass only; this is not
 * iterated to a fixed point.
 *
 * Returns input instance -> estimated Team.
 */
export function estimateStrengths(
  matches: ReadonlyArray<Match>,
  options?: EstimateStrengthsOptions
): Map<Team, Team> {
  const { transform = DEFAULT_TRANSFORM, teams } = options ?? {};
  const played = matches.filter(isPlayed);
  const universe = teams ? [...teams] : [...new Set(played.flatMap((m) => [m.home, m.away]))];
  if (universe.length === 0) {
    throw new InsufficientDataError('estimateStrengths: no played matches to estimate from');
  }

  const stats = universe.map(
    (team) => new TeamStatistics(team, playedBy(team, played, 'estimateStrengths'))
  );

  const medianCount = median(stats.map((s) => s.numberOfMatches));
  const anchor = new Team(
    ANCHOR_NAME,
    transform.strengthDiff(orSubstitute(median(stats.map((s) => s.averageGoalsConceded)), medianCount)),
    -transform.strengthDiff(orSubstitute(median(stats.map((s) => s.averageGoalsScored)), medianCount))
  );

  const ratings = new Map<Team, Team>();
  for (const s of stats) {
    const seed = implied(transform, anchor, {
      count: s.numberOfMatches,
      averageScored: s.averageGoalsScored,
      averageConceded: s.averageGoalsConceded,
    });
    ratings.set(s.team, new Team(s.team.name, seed.attack, seed.defense));
  }

  const strengthOf = (t: Team) => (ratings.get(t) ?? t).strength;
  const order = [...universe].sort((a, b) => strengthOf(a) - strengthOf(b));
  for (const team of order) {
    ratings.set(team, estimateTeam(team, played, { transform, ratings }));
  }
  return ratings;
}
