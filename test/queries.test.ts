import { describe, expect, it } from "vitest";
import { SolverError } from "@/lib/errors";
import {
  NO_ANSWERS,
  countByTarget,
  countSolutions,
  coverage,
  largestTotal,
  searchCombinations,
  solveReport,
  valueCounts,
} from "@/lib/queries";

describe("countSolutions", () => {
  it("counts distinct answers", () => {
    expect(countSolutions([2, 2], 4)).toBe(2);
    expect(countSolutions([2, 3], 7)).toBe(0);
  });
});

describe("valueCounts", () => {
  it("tallies every valid value of the distinct trees", () => {
    expect(valueCounts([2, 2])).toEqual(
      new Map([
        [4n, 2],
        [0n, 1],
        [1n, 1],
      ])
    );
  });

  it("agrees with counting one target at a time", () => {
    const counts = valueCounts([1, 3, 4, 6]);
    for (const target of [1, 10, 24, 30]) {
      expect(counts.get(BigInt(target)) ?? 0).toBe(countSolutions([1, 3, 4, 6], target));
    }
  });
});

describe("solveReport", () => {
  it("numbers each answer with a running count", () => {
    expect(solveReport([2, 2], 4)).toEqual({
      matches: ["(2 + 2) = 4", "(2 × 2) = 4"],
      lines: ["1: (2 + 2) = 4", "2: (2 × 2) = 4"],
      count: 2,
    });
  });

  it("says so when nothing reaches the target", () => {
    expect(solveReport([2, 3], 7)).toEqual({ matches: [], lines: [NO_ANSWERS], count: 0 });
    expect(NO_ANSWERS).toBe("No answers found");
  });
});

describe("countByTarget", () => {
  it("keeps targets with at least one answer by default", () => {
    expect(countByTarget([2, 3], { from: 1, to: 6 })).toEqual([
      { target: 1, count: 1 },
      { target: 5, count: 1 },
      { target: 6, count: 1 },
    ]);
  });

  it("filters by a count window", () => {
    expect(countByTarget([2, 3], { from: 1, to: 6, min: 0, max: 0 })).toEqual([
      { target: 2, count: 0 },
      { target: 3, count: 0 },
      { target: 4, count: 0 },
    ]);
    expect(countByTarget([2, 2], { from: 1, to: 4, min: 2 })).toEqual([{ target: 4, count: 2 }]);
  });

  it("counts a five-number hand across two thousand targets in one pass", () => {
    const started = Date.now();
    const rows = countByTarget([1, 2, 3, 4, 5], { from: 1, to: 2000 });
    expect(Date.now() - started).toBeLessThan(15_000);
    expect(rows.find((r) => r.target === 100)).toEqual({ target: 100, count: 13 });
    expect(rows.find((r) => r.target === 1_999)).toBeUndefined();
  }, 30_000);

  it("rejects an empty range or an inverted window", () => {
    expect(() => countByTarget([2, 3], { from: 5, to: 4 })).toThrow(SolverError);
    expect(() => countByTarget([2, 3], { from: 1, to: 4, min: 3, max: 2 })).toThrow(SolverError);
  });
});

describe("largestTotal", () => {
  it("adds ones instead of multiplying by them", () => {
    expect(largestTotal([1, 1, 5])).toBe(7);
    expect(largestTotal([1, 1])).toBe(2);
  });

  it("multiplies everything else", () => {
    expect(largestTotal([2, 3, 4])).toBe(24);
    expect(largestTotal([7])).toBe(7);
  });
});

describe("coverage", () => {
  it("reports contiguous reachable ranges up to the largest total", () => {
    expect(coverage([2, 3])).toEqual({
      upTo: 6,
      ranges: [
        { from: 1, to: 1 },
        { from: 5, to: 6 },
      ],
      firstGap: 2,
    });
  });

  it("reports no gap when every target is reachable", () => {
    expect(coverage([1, 2])).toEqual({ upTo: 3, ranges: [{ from: 1, to: 3 }], firstGap: null });
  });

  it("can stop at the first gap", () => {
    expect(coverage([2, 3], { stopAtFirstGap: true })).toEqual({
      upTo: 6,
      ranges: [{ from: 1, to: 1 }],
      firstGap: 2,
    });
  });

  it("returns no ranges when target 1 is already unreachable", () => {
    expect(coverage([3, 5], { stopAtFirstGap: true })).toEqual({ upTo: 15, ranges: [], firstGap: 1 });
    expect(coverage([3, 5])).toEqual({
      upTo: 15,
      ranges: [
        { from: 2, to: 2 },
        { from: 8, to: 8 },
        { from: 15, to: 15 },
      ],
      firstGap: 1,
    });
  });

  it("honours an explicit bound", () => {
    expect(coverage([2, 2], { upTo: 4 }).ranges).toEqual([
      { from: 1, to: 1 },
      { from: 4, to: 4 },
    ]);
  });
});

describe("searchCombinations", () => {
  it("finds hands whose answer count is in the window", () => {
    expect(searchCombinations({ size: 2, lowest: 1, highest: 3, target: 4 })).toEqual([
      { numbers: [1, 3], count: 1 },
      { numbers: [2, 2], count: 2 },
    ]);
    expect(searchCombinations({ size: 2, lowest: 1, highest: 3, target: 4, min: 2 })).toEqual([
      { numbers: [2, 2], count: 2 },
    ]);
  });

  it("rejects malformed searches", () => {
    expect(() => searchCombinations({ size: 0, lowest: 1, highest: 3, target: 4 })).toThrow(SolverError);
    expect(() => searchCombinations({ size: 2, lowest: 4, highest: 3, target: 4 })).toThrow(SolverError);
  });
});
