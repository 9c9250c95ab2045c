import { describe, it, expect } from "vitest";
import { PRNG } from "../src/utils/PRNG";
import { scriptedRng } from "./helpers";

describe("PRNG", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = new PRNG(42);
    const b = new PRNG(42);
    const seqA = Array.from({ length: 8 }, () => a.next());
    const seqB = Array.from({ length: 8 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("diverges for different seeds", () => {
    expect(new PRNG(1).next()).not.toBe(new PRNG(2).next());
  });

  it("stays within [0, 1)", () => {
    const rng = new PRNG(9);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("maps draws onto float and inclusive int ranges", () => {
    const rng = scriptedRng([0.5, 0, 0.999]);
    expect(rng.float(3, 6)).toBe(4.5);
    expect(rng.int(-25, 24)).toBe(-25);
    expect(rng.int(-25, 24)).toBe(24);
  });

  it("forks a child stream that is reproducible", () => {
    const childA = new PRNG(5).fork();
    const childB = new PRNG(5).fork();
    expect(childA.next()).toBe(childB.next());
  });
});
