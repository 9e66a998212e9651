// src/models/round.ts

import { InvariantViolation } from '../errors';
import type { Match } from './match';
import type { Team } from './team';

/** Matches played concurrently: non-empty, no team appears twice. */
export class Round {
  readonly kind = 'round' as const;
  readonly matches: ReadonlyArray<Match>;

  constructor(matches: ReadonlyArray<Match>) {
    if (matches.length === 0) {
      throw new InvariantViolation('Round: a round needs at least one match');
    }
    const seen = new Set<Team>();
    for (const m of matches) {
      for (const t of [m.home, m.away]) {
        if (seen.has(t)) {
          throw new InvariantViolation(`Round: ${t.name} appears more than once`, { team: t });
        }
        seen.add(t);
      }
    }
    this.matches = Object.freeze([...matches]);
    Object.freeze(this);
  }

  get teams(): Team[] {
    return this.matches.flatMap((m) => [m.home, m.away]);
  }

  get isPlayed(): boolean {
    return this.matches.every((m) => m.isPlayed);
  }

  swapped(): Round {
    return new Round(this.matches.map((m) => m.swapped()));
  }
}
