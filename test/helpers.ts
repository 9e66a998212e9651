import type { Match } from "../src/models/match";
import type { Round } from "../src/models/round";
import type { Rng } from "../src/utils/random";

// Safe indexed access helper (throws if out of range)
export function mustAt<T>(arr: readonly T[], i: number, label = "index"): T {
  const v = arr[i];
  if (v === undefined) throw new Error(`Out of range: ${label}=${i}`);
  return v;
}

/** Replays fixed draws; throws when the script runs out. */
export function scripted(values: readonly number[]): Rng & { calls: () => number } {
  let i = 0;
  const rng = () => {
    const v = values[i];
    if (v === undefined) throw new Error(`scripted rng exhausted after ${i} draws`);
    i++;
    return v;
  };
  return Object.assign(rng, { calls: () => i });
}

export const label = (m: Match): string => `${m.home.name}-${m.away.name}`;

export const labels = (rounds: readonly Round[]): string[][] =>
  rounds.map((r) => r.matches.map(label));

export const normPair = (m: Match): string =>
  [m.home.name, m.away.name].sort().join("|");
