import { describe, expect, it } from "vitest";

import { createSeededRandom, pick, sample, uniform } from "@/lib/random";

import { sequenceRandom } from "./fixtures";

describe("createSeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const first = createSeededRandom(42);
    const second = createSeededRandom(42);
    const a = Array.from({ length: 5 }, () => first());
    const b = Array.from({ length: 5 }, () => second());

    expect(a).toEqual(b);
    for (const value of a) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("diverges for different seeds", () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });
});

describe("pick", () => {
  it("maps the draw onto an index", () => {
    expect(pick(["a", "b", "c"], () => 0)).toBe("a");
    expect(pick(["a", "b", "c"], () => 0.5)).toBe("b");
    expect(pick(["a", "b", "c"], () => 0.99)).toBe("c");
  });

  it("rejects an empty list", () => {
    expect(() => pick([], () => 0)).toThrow(RangeError);
  });
});

describe("sample", () => {
  it("returns distinct items in draw order", () => {
    // i=0: j = 0 + floor(0.5 * 4) = 2 -> c; i=1: j = 1 + floor(0 * 3) = 1 -> b
    expect(sample(["a", "b", "c", "d"], 2, sequenceRandom([0.5, 0]))).toEqual(["c", "b"]);
  });

  it("caps the size at the list length", () => {
    expect(sample(["a", "b"], 5, () => 0)).toEqual(["a", "b"]);
    expect(sample([], 3, () => 0)).toEqual([]);
  });
});

describe("uniform", () => {
  it("scales the draw into the range", () => {
    expect(uniform(0.5, 1.5, () => 0.25)).toBe(0.75);
  });
});
