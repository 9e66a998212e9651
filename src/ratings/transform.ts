// src/ratings/transform.ts
// Strength differential <-> expected goals. The only conversion point between
// rating space and outcome space; simulation and estimation both go through it.

import { parseConfig, TransformConfigSchema, type TransformConfig } from '../config';
import { DomainError } from '../errors';

export interface StrengthTransform {
  readonly baseline: number;
  readonly factor: number;
  /** baseline * factor^diff */
  expectedGoals(diff: number): number;
  /** Inverse of expectedGoals; defined for xg > 0 only. */
  strengthDiff(xg: number): number;
}

export function createStrengthTransform(config?: TransformConfig): StrengthTransform {
  const { baseline, factor } = parseConfig(TransformConfigSchema, config, 'createStrengthTransform');
  const logFactor = Math.log(factor);

  return Object.freeze({
    baseline,
    factor,
    expectedGoals(diff: number): number {
      return baseline * Math.pow(factor, diff);
    },
    strengthDiff(xg: number): number {
      if (!Number.isFinite(xg) || xg <= 0) {
        throw new DomainError(`strengthDiff: expected goals must be a positive finite number, got ${xg}`, { xg });
      }
      return Math.log(xg / baseline) / logFactor;
    },
  });
}

export const DEFAULT_TRANSFORM: StrengthTransform = createStrengthTransform();

export function expectedGoals(diff: number): number {
  return DEFAULT_TRANSFORM.expectedGoals(diff);
}

export function strengthDiff(xg: number): number {
  return DEFAULT_TRANSFORM.strengthDiff(xg);
}
