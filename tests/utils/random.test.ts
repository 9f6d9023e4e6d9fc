import { describe, it, expect } from "vitest";
import { sampleWithoutReplacement } from "../../src/utils/random.js";

describe("sampleWithoutReplacement", () => {
  const items = ["a", "b", "c", "d", "e"];

  it("returns distinct members of the population", () => {
    const picked = sampleWithoutReplacement(items, 3);
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
    for (const p of picked) expect(items).toContain(p);
  });

  it("returns the whole population when asked for more", () => {
    expect(sampleWithoutReplacement(items, 10).sort()).toEqual(items);
  });

  it("returns nothing for a count of zero or less", () => {
    expect(sampleWithoutReplacement(items, 0)).toEqual([]);
    expect(sampleWithoutReplacement(items, -2)).toEqual([]);
  });

  it("follows the random source", () => {
    expect(sampleWithoutReplacement(items, 2, () => 0)).toEqual(["a", "b"]);
    // 0.99 always swaps in the last remaining element.
    expect(sampleWithoutReplacement(items, 2, () => 0.99)).toEqual(["e", "a"]);
  });

  it("leaves the input untouched", () => {
    const copy = [...items];
    sampleWithoutReplacement(items, 5, () => 0.5);
    expect(items).toEqual(copy);
  });
});
