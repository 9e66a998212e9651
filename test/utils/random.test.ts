import { describe, it, expect } from "vitest";
import { createRng, randomInt, shuffle } from "../../src/utils/random";

describe("Random source", () => {
  it("same seed → same stream; different seeds → different streams", () => {
    const a = createRng("seed-1");
    const b = createRng("seed-1");
    const c = createRng("seed-2");
    const sa = Array.from({ length: 5 }, () => a());
    const sb = Array.from({ length: 5 }, () => b());
    const sc = Array.from({ length: 5 }, () => c());
    expect(sa).toEqual(sb);
    expect(sa).not.toEqual(sc);
  });

  it("numeric and string seeds are interchangeable", () => {
    expect(createRng(42)()).toBe(createRng("42")());
  });

  it("draws stay in [0, 1)", () => {
    const rng = createRng("bounds");
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("randomInt is inclusive on both ends", () => {
    const rng = createRng("ints");
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = randomInt(rng, 3, 6);
      expect(Number.isInteger(v)).toBe(true);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([3, 4, 5, 6]);
  });

  it("shuffle returns a permutation and leaves the input alone", () => {
    const input = Object.freeze(["A", "B", "C", "D", "E", "F"]);
    const out = shuffle(input, createRng("perm"));
    expect(out).not.toBe(input);
    expect([...out].sort()).toEqual([...input]);
    expect(input).toEqual(["A", "B", "C", "D", "E", "F"]);
  });
});
