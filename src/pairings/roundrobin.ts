// src/pairings/roundrobin.ts
// --------------------------------------
// Round-robin fixtures (circle method) with alternating home/away legs

import { parseConfig, ScheduleConfigSchema, type ScheduleConfig } from '../config';
import { ConfigurationError } from '../errors';
import { Match } from '../models/match';
import { Round } from '../models/round';
import type { Team } from '../models/team';
import { DEFAULT_TRANSFORM, type StrengthTransform } from '../ratings/transform';
import { coinFlip, createRng, shuffle, type Rng } from '../utils/random';

export interface RoundRobinOptions extends ScheduleConfig {
  /**
   * Random source for the initial shuffle and home/away coin flips.
   * Default: an unseeded source (non-deterministic schedule).
   */
  rng?: Rng;
  /** Transform used for the fixtures' expected goals. */
  transform?: StrengthTransform;
}

/** Empty slot inserted for odd team counts; whoever meets it sits the round out. */
const BYE = null;
type Slot = Team | typeof BYE;

function pairRound(slots: ReadonlyArray<Slot>, rng: Rng, transform: StrengthTransform): Round {
  const n = slots.length;
  const matches: Match[] = [];
  for (let i = 0; i < n / 2; i++) {
    const a = slots[i] ?? BYE;
    const b = slots[n - 1 - i] ?? BYE;
    if (a === BYE || b === BYE) continue;
    const match = new Match(a, b, undefined, transform);
    matches.push(coinFlip(rng) ? match.swapped() : match);
  }
  return new Round(matches);
}

/**
 * Build every round of a round-robin tournament.
 *
 * Teams are shuffled once, then slot 0 stays fixed while the others rotate one
 * step per round; slot i meets slot n-1-i. One iteration is n-1 rounds (n
 * padded to even). Each further iteration repeats the previous one with home
 * and away exchanged.
 */
export function buildRoundRobinSchedule(
  teamsIn: ReadonlyArray<Team>,
  options?: RoundRobinOptions
): Round[] {
  const {
    rng = createRng(),
    transform = DEFAULT_TRANSFORM,
    ...config
  } = options ?? {};
  const { iterations } = parseConfig(ScheduleConfigSchema, config, 'buildRoundRobinSchedule');

  if (teamsIn.length < 2) {
    throw new ConfigurationError(
      `buildRoundRobinSchedule: need at least two teams, got ${teamsIn.length}`,
      { teams: teamsIn.length }
    );
  }
  if (new Set(teamsIn).size !== teamsIn.length) {
    throw new ConfigurationError('buildRoundRobinSchedule: the same team was listed more than once');
  }

  const slots: Slot[] = [...teamsIn];
  if (slots.length % 2 === 1) slots.push(BYE);

  const [fixed = BYE, ...rest] = shuffle(slots, rng);
  const firstLeg: Round[] = [];
  let line = rest;
  for (let r = 0; r < slots.length - 1; r++) {
    firstLeg.push(pairRound([fixed, ...line], rng, transform));
    line = [...line.slice(1), ...line.slice(0, 1)];
  }

  const rounds = [...firstLeg];
  let previous = firstLeg;
  for (let it = 1; it < iterations; it++) {
    const next = previous.map((rd) => rd.swapped());
    rounds.push(...next);
    previous = next;
  }
  return rounds;
}

/**
 * Convenience: get a single round (1-based index).
 * Pass a seeded `rng` to get the same schedule on every call.
 */
export function getRoundRobinRound(
  teams: ReadonlyArray<Team>,
  roundNumber: number,
  options?: RoundRobinOptions
): Round {
  const rounds = buildRoundRobinSchedule(teams, options);
  const rd = rounds[roundNumber - 1];
  if (!Number.isInteger(roundNumber) || !rd) {
    throw new ConfigurationError(
      `getRoundRobinRound: round ${roundNumber} out of range (1..${rounds.length})`,
      { roundNumber, total: rounds.length }
    );
  }
  return rd;
}
