import { describe, it, expect } from "vitest";
import { Team } from "../../src/models/team";
import { ConfigurationError } from "../../src/errors";
import { createRng } from "../../src/utils/random";

describe("Team – construction", () => {
  it("strength is the mean of attack and defense", () => {
    expect(new Team("A", 7, 4).strength).toBe(5.5);
  });

  it("fromStrength splits around the attack/defense difference", () => {
    const t = Team.fromStrength("X", 10, 2);
    expect(t.attack).toBe(12);
    expect(t.defense).toBe(8);
    expect(t.strength).toBe(10);
    expect(Team.fromStrength("Y", 10).attack).toBe(10);
  });

  it("identity is the instance, not the name", () => {
    const a = new Team("Same", 1, 1);
    const b = new Team("Same", 1, 1);
    expect(a).not.toBe(b);
    expect(new Set([a, b]).size).toBe(2);
  });

  it("is immutable", () => {
    const t = new Team("A", 1, 2);
    expect(Object.isFrozen(t)).toBe(true);
  });

  it("compareByStrength orders weakest first", () => {
    const teams = [new Team("S", 9, 9), new Team("W", 1, 1), new Team("M", 5, 5)];
    expect([...teams].sort(Team.compareByStrength).map((t) => t.name)).toEqual(["W", "M", "S"]);
  });
});

describe("Team – generate", () => {
  it("strengths fall in range with a bounded attack/defense split", () => {
    const names = Array.from({ length: 30 }, (_, i) => `T${i}`);
    const teams = Team.generate(names, { minStrength: 10, maxStrength: 50 }, createRng("gen"));

    expect(teams.map((t) => t.name)).toEqual(names);
    for (const t of teams) {
      expect(Number.isInteger(t.strength)).toBe(true);
      expect(t.strength).toBeGreaterThanOrEqual(10);
      expect(t.strength).toBeLessThanOrEqual(50);
      expect(Number.isInteger(t.attack)).toBe(true);
      expect(Math.abs(t.attack - t.strength)).toBeLessThanOrEqual(Math.sqrt(t.strength));
    }
  });

  it("is deterministic for a seeded source", () => {
    const a = Team.generate(["A", "B", "C"], { minStrength: 0, maxStrength: 100 }, createRng(7));
    const b = Team.generate(["A", "B", "C"], { minStrength: 0, maxStrength: 100 }, createRng(7));
    expect(a.map((t) => [t.attack, t.defense])).toEqual(b.map((t) => [t.attack, t.defense]));
  });

  it("rejects inverted or negative ranges", () => {
    const rng = createRng("bad");
    expect(() => Team.generate(["A"], { minStrength: 5, maxStrength: 4 }, rng)).toThrow(ConfigurationError);
    expect(() => Team.generate(["A"], { minStrength: -1, maxStrength: 4 }, rng)).toThrow(ConfigurationError);
  });
});
