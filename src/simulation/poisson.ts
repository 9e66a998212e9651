// src/simulation/poisson.ts

import { DomainError } from '../errors';
import type { Rng } from '../utils/random';

/** Below this rate Knuth's multiplication loop is used; above it, PTRS. */
const KNUTH_MAX_RATE = 10;

/**
 * Poisson variate with mean `lambda`.
 *
 * Small rates use Knuth's algorithm: multiply fresh uniform draws until the
 * product drops below e^-lambda. Large rates use Hörmann's transformed
 * rejection (PTRS), whose draw count does not grow with the rate.
 * A rate of 0 yields 0.
 */
export function poisson(lambda: number, rng: Rng): number {
  if (!Number.isFinite(lambda) || lambda < 0) {
    throw new DomainError(`poisson: rate must be a non-negative finite number, got ${lambda}`, { lambda });
  }
  return lambda < KNUTH_MAX_RATE ? knuth(lambda, rng) : ptrs(lambda, rng);
}

function knuth(lambda: number, rng: Rng): number {
  const limit = Math.exp(-lambda);
  let product = rng();
  let k = 0;
  while (product >= limit) {
    product *= rng();
    k++;
  }
  return k;
}

// W. Hörmann, "The transformed rejection method for generating Poisson random
// variables", Insurance: Mathematics and Economics 12 (1993).
function ptrs(lambda: number, rng: Rng): number {
  const logLambda = Math.log(lambda);
  const b = 0.931 + 2.53 * Math.sqrt(lambda);
  const a = -0.059 + 0.02483 * b;
  const invAlpha = 1.1239 + 1.1328 / (b - 3.4);
  const vr = 0.9277 - 3.6224 / (b - 2);

  for (;;) {
    const u = rng() - 0.5;
    const v = rng();
    const us = 0.5 - Math.abs(u);
    const k = Math.floor(((2 * a) / us + b) * u + lambda + 0.43);
    if (us >= 0.07 && v <= vr) return k;
    if (k < 0 || (us < 0.013 && v > us)) continue;
    const lhs = Math.log(v) + Math.log(invAlpha) - Math.log(a / (us * us) + b);
    if (lhs <= -lambda + k * logLambda - logGamma(k + 1)) return k;
  }
}

const STIRLING = [
  8.333333333333333e-2, -2.777777777777778e-3, 7.936507936507937e-4,
  -5.952380952380952e-4, 8.417508417508418e-4, -1.917526917526918e-3,
  6.41025641025641e-3, -2.955065359477124e-2, 1.796443723688307e-1,
  -1.3924322169059,
] as const;

/** ln Γ(x) for x >= 1, by the Stirling series after shifting x above 7. */
export function logGamma(x: number): number {
  if (x === 1 || x === 2) return 0;
  const shift = x <= 7 ? Math.floor(7 - x) : 0;
  let x0 = x + shift;
  const x2 = 1 / (x0 * x0);
  let series = 0;
  for (let i = STIRLING.length - 1; i >= 0; i--) series = series * x2 + (STIRLING[i] ?? 0);
  let gl = series / x0 + 0.5 * Math.log(2 * Math.PI) + (x0 - 0.5) * Math.log(x0) - x0;
  for (let i = 0; i < shift; i++) {
    x0 -= 1;
    gl -= Math.log(x0);
  }
  return gl;
}
