import { describe, it, expect } from "vitest";
import { simulate } from "../../src/simulation/simulate";
import { Match } from "../../src/models/match";
import { Result } from "../../src/models/result";
import { Round } from "../../src/models/round";
import { Team } from "../../src/models/team";
import { Tournament } from "../../src/models/tournament";
import { PreconditionError } from "../../src/errors";
import { expectedGoals } from "../../src/ratings/transform";
import { createRng } from "../../src/utils/random";
import { mustAt, scripted } from "../helpers";

const A = new Team("A", 2, 2);
const B = new Team("B", 0, 0);
const C = new Team("C", 1, 1);
const D = new Team("D", 3, 0);

describe("simulate – match", () => {
  it("draws home goals first, then away goals", () => {
    // both sides xg 1.3 → limit e^-1.3 ≈ 0.2725
    // home: 0.1 < limit → 0 ; away: 0.9 → 0.18 → 1
    const rng = scripted([0.1, 0.9, 0.2]);
    const played = simulate(new Match(B, new Team("E", 0, 0)), rng);
    expect(played.result?.homeGoals).toBe(0);
    expect(played.result?.awayGoals).toBe(1);
    expect(rng.calls()).toBe(3);
  });

  it("refuses to re-simulate a played match", () => {
    const played = new Match(A, B, new Result(1, 0));
    expect(() => simulate(played, createRng("x"))).toThrow(PreconditionError);
  });

  it("same seed on two copies of a fixture → same result", () => {
    const r1 = simulate(new Match(A, B), createRng("same")).result;
    const r2 = simulate(new Match(A, B), createRng("same")).result;
    expect(r1 && r2 && r1.equals(r2)).toBe(true);
  });

  it("does not touch the input fixture", () => {
    const fixture = new Match(A, B);
    const played = simulate(fixture, createRng("pure"));
    expect(fixture.result).toBeUndefined();
    expect(played.home).toBe(A);
    expect(played.away).toBe(B);
  });

  it("mean goals converge to the expected goals over 10,000 trials", () => {
    const rng = createRng("converge");
    const fixture = new Match(A, B);
    const trials = 10_000;
    let home = 0, away = 0;
    for (let i = 0; i < trials; i++) {
      const r = simulate(fixture, rng).result;
      home += r?.homeGoals ?? 0;
      away += r?.awayGoals ?? 0;
    }
    expect(Math.abs(home / trials - expectedGoals(2))).toBeLessThan(0.06);
    expect(Math.abs(away / trials - expectedGoals(-2))).toBeLessThan(0.05);
  });

  it("lopsided fixtures with very large expected goals still finish", () => {
    const strong = new Team("S", 160, 160);
    const weak = new Team("W", 0, 0);
    const fixture = new Match(strong, weak);
    expect(fixture.homeExpectedGoals).toBeGreaterThan(745);

    const result = simulate(fixture, createRng("lopsided")).result;
    const xg = fixture.homeExpectedGoals;
    expect(result).toBeDefined();
    expect(Math.abs((result?.homeGoals ?? -1) - xg)).toBeLessThan(10 * Math.sqrt(xg));
  });

  it("an away side whose expected goals underflow to zero scores nothing", () => {
    const fixture = new Match(new Team("S", 0, 20_000), new Team("W", 0, 0));
    expect(fixture.awayExpectedGoals).toBe(0);
    const result = simulate(fixture, createRng("underflow")).result;
    expect(result?.awayGoals).toBe(0);
  });
});

describe("simulate – round", () => {
  it("maps every unplayed match, keeping order and carrying played ones over", () => {
    const done = new Match(C, D, new Result(2, 2));
    const round = new Round([new Match(A, B), done]);
    const out = simulate(round, createRng("round"));

    expect(out).not.toBe(round);
    expect(out.matches.length).toBe(2);
    expect(mustAt(out.matches, 0).home).toBe(A);
    expect(mustAt(out.matches, 0).isPlayed).toBe(true);
    expect(mustAt(out.matches, 1)).toBe(done);
    expect(round.isPlayed).toBe(false);
    expect(out.isPlayed).toBe(true);
  });
});

describe("simulate – tournament", () => {
  it("plays every round and records one standings snapshot per round", () => {
    const teams = [A, B, C, D];
    const t = Tournament.create(teams, { iterations: 2, rng: createRng("league") });
    const out = simulate(t, createRng("league-sim"));

    expect(t.standings.length).toBe(1);
    expect(t.rounds.every((r) => !r.isPlayed)).toBe(true);

    expect(out.rounds.length).toBe(6);
    expect(out.rounds.every((r) => r.isPlayed)).toBe(true);
    expect(out.standings.length).toBe(7);
    expect(out.initialTable).toBe(t.initialTable);

    out.standings.forEach((table, i) => {
      for (const row of table.rows) expect(row.matchesPlayed).toBe(i);
    });

    const final = out.table;
    const goals = out.matches.reduce((s, m) => s + (m.result ? m.result.homeGoals + m.result.awayGoals : 0), 0);
    expect(final.rows.reduce((s, r) => s + r.goalsScored, 0)).toBe(goals);
    expect(final.rows.map((r) => r.position)).toEqual([1, 2, 3, 4]);
  });

  it("is reproducible with seeded sources", () => {
    const build = () =>
      simulate(
        Tournament.create([A, B, C, D], { rng: createRng("rep") }),
        createRng("rep-sim")
      );
    const keys = (t: Tournament) => t.matches.map((m) => `${m.home.name}${m.result?.key}${m.away.name}`);
    expect(keys(build())).toEqual(keys(build()));
  });
});
