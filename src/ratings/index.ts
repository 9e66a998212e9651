// src/ratings/index.ts

export {
  createStrengthTransform,
  expectedGoals,
  strengthDiff,
  DEFAULT_TRANSFORM,
  type StrengthTransform,
} from './transform';

export {
  estimateTeam,
  estimateStrengths,
  type EstimateTeamOptions,
  type EstimateStrengthsOptions,
} from './estimator';
