// src/index.ts

// ──────────────────────────────────────────────────────────────
// Models: teams, results, fixtures, rounds, tournaments
// ──────────────────────────────────────────────────────────────
export {
  Team,
  Result,
  Match,
  Round,
  Tournament,
  type TournamentOptions,
} from './models';

// ──────────────────────────────────────────────────────────────
// Scheduling (round-robin circle method)
// ──────────────────────────────────────────────────────────────
export {
  buildRoundRobinSchedule,
  getRoundRobinRound,
  type RoundRobinOptions,
} from './pairings';

// ──────────────────────────────────────────────────────────────
// Simulation (Poisson scorelines over Match | Round | Tournament)
// ──────────────────────────────────────────────────────────────
export { simulate, poisson, type Simulatable } from './simulation';

// ──────────────────────────────────────────────────────────────
// Standings
// ──────────────────────────────────────────────────────────────
export {
  StandingsTable,
  DEFAULT_TIE_BREAK,
  type StandingsRow,
  type StandingsOptions,
  type TieBreakPolicy,
} from './standings';

// ──────────────────────────────────────────────────────────────
// Ratings: expected-goals transform + strength estimation
// ──────────────────────────────────────────────────────────────
export {
  createStrengthTransform,
  expectedGoals,
  strengthDiff,
  DEFAULT_TRANSFORM,
  estimateTeam,
  estimateStrengths,
  type StrengthTransform,
  type EstimateTeamOptions,
  type EstimateStrengthsOptions,
} from './ratings';

// ──────────────────────────────────────────────────────────────
// Statistics
// ──────────────────────────────────────────────────────────────
export {
  MatchStatistics,
  TeamStatistics,
  HeadToHeadStatistics,
  type ResultFrequency,
} from './statistics';

// ──────────────────────────────────────────────────────────────
// Random source, configuration, errors
// ──────────────────────────────────────────────────────────────
export { createRng, randomInt, coinFlip, shuffle, type Rng } from './utils/random';
export {
  DEFAULT_BASELINE_XG,
  DEFAULT_XG_FACTOR,
  type TransformConfig,
  type ScheduleConfig,
  type PointsConfig,
  type GenerateConfig,
} from './config';
export {
  TournamentError,
  ConfigurationError,
  DomainError,
  PreconditionError,
  InsufficientDataError,
  InvariantViolation,
  type ErrorContext,
} from './errors';
