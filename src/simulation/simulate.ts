// src/simulation/simulate.ts
// Structure-preserving simulation over the closed set Match | Round | Tournament.

import { PreconditionError } from '../errors';
import type { Match } from '../models/match';
import { Result } from '../models/result';
import { Round } from '../models/round';
import { Tournament } from '../models/tournament';
import type { StandingsTable } from '../standings/table';
import type { Rng } from '../utils/random';
import { poisson } from './poisson';

export type Simulatable = Match | Round | Tournament;

function simulateMatch(match: Match, rng: Rng): Match {
  if (match.result) {
    throw new PreconditionError(`simulate: ${match.toString()} has already been played`, { match });
  }
  // home first, then away: two separate draws from the stream
  const homeGoals = poisson(match.homeExpectedGoals, rng);
  const awayGoals = poisson(match.awayExpectedGoals, rng);
  return match.withResult(new Result(homeGoals, awayGoals));
}

/** Played matches are carried over unchanged. */
function simulateRound(round: Round, rng: Rng): Round {
  return new Round(round.matches.map((m) => (m.isPlayed ? m : simulateMatch(m, rng))));
}

/** Every round in order, with a standings snapshot appended after each one. */
function simulateTournament(tournament: Tournament, rng: Rng): Tournament {
  const rounds: Round[] = [];
  let table = tournament.initialTable;
  const standings: StandingsTable[] = [table];
  for (const rd of tournament.rounds) {
    const played = simulateRound(rd, rng);
    rounds.push(played);
    table = table.update(played.matches);
    standings.push(table);
  }
  return new Tournament(tournament.teams, rounds, standings);
}

export function simulate(model: Match, rng: Rng): Match;
export function simulate(model: Round, rng: Rng): Round;
export function simulate(model: Tournament, rng: Rng): Tournament;
export function simulate(model: Simulatable, rng: Rng): Simulatable;
export function simulate(model: Simulatable, rng: Rng): Simulatable {
  switch (model.kind) {
    case 'match':
      return simulateMatch(model, rng);
    case 'round':
      return simulateRound(model, rng);
    case 'tournament':
      return simulateTournament(model, rng);
    default: {
      // Exhaustiveness guard
      const _exhaustive: never = model;
      return _exhaustive;
    }
  }
}
