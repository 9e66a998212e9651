// src/models/team.ts

import { GenerateConfigSchema, parseConfig, type GenerateConfig } from '../config';
import { coinFlip, randomInt, type Rng } from '../utils/random';

/**
 * A contestant with latent attack/defense ratings (larger is better).
 *
 * Identity is the instance: two teams with the same name and ratings are still
 * different contestants. A new strength estimate is a new Team.
 */
export class Team {
  readonly strength: number;

  constructor(
    readonly name: string,
    readonly attack: number,
    readonly defense: number
  ) {
    this.strength = (attack + defense) / 2;
    Object.freeze(this);
  }

  /** Split a strength into attack/defense around `adDifference`. */
  static fromStrength(name: string, strength: number, adDifference = 0): Team {
    return new Team(name, strength + adDifference, strength - adDifference);
  }

  /**
   * Random teams: strength uniform in [minStrength, maxStrength], and an
   * attack/defense split of up to sqrt(strength) in either direction.
   */
  static generate(names: ReadonlyArray<string>, config: GenerateConfig, rng: Rng): Team[] {
    const { minStrength, maxStrength } = parseConfig(GenerateConfigSchema, config, 'Team.generate');
    return names.map((name) => {
      const strength = randomInt(rng, minStrength, maxStrength);
      const sign = coinFlip(rng) ? -1 : 1;
      // `|| 0` folds -0 into 0
      const adDifference = Math.trunc(rng() * Math.sqrt(strength)) * sign || 0;
      return Team.fromStrength(name, strength, adDifference);
    });
  }

  static compareByStrength(a: Team, b: Team): number {
    return a.strength - b.strength;
  }

  toString(): string {
    return this.name;
  }
}
