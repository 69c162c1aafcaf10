import { describe, expect, it } from "vitest";
import { combinationCount, combinations } from "@/lib/combinations";

describe("combinations", () => {
  it("yields non-decreasing tuples in lexicographic order", () => {
    expect([...combinations(2, 1, 3)]).toEqual([
      [1, 1],
      [1, 2],
      [1, 3],
      [2, 2],
      [2, 3],
      [3, 3],
    ]);
  });

  it("yields one empty tuple for size 0 and nothing for an empty range", () => {
    expect([...combinations(0, 1, 3)]).toEqual([[]]);
    expect([...combinations(2, 4, 3)]).toEqual([]);
  });

  it("agrees with combinationCount", () => {
    expect(combinationCount(2, 1, 3)).toBe(6);
    expect([...combinations(3, 1, 13)]).toHaveLength(combinationCount(3, 1, 13));
    expect(combinationCount(3, 1, 13)).toBe(455);
    expect(combinationCount(0, 1, 3)).toBe(1);
    expect(combinationCount(2, 4, 3)).toBe(0);
  });
});
