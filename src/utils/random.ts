// src/utils/random.ts
// Explicit random source threaded through scheduling, team generation and simulation.

import { fnv1a } from './hash';

/** Uniform draw in [0, 1). */
export type Rng = () => number;

/** Tiny PRNG */
function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Create a random source.
 * With a seed the stream is deterministic; without one it defers to Math.random.
 * Parallel simulations should each get their own handle.
 */
export function createRng(seed?: string | number): Rng {
  if (seed === undefined) return Math.random;
  return mulberry32(fnv1a(`rng::${seed}`));
}

/** Integer in [min, max], both inclusive. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function coinFlip(rng: Rng): boolean {
  return rng() < 0.5;
}

/** Fisher–Yates shuffle into a fresh array; the input is left untouched. */
export function shuffle<T>(items: ReadonlyArray<T>, rng: Rng): T[] {
  const arr = [...items];
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = arr[i]; arr[i] = arr[j] as T; arr[j] = tmp as T;
  }
  return arr;
}
