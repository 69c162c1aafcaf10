import { describe, expect, it } from "vitest";
import { permutations } from "@/lib/permutations";

describe("permutations", () => {
  it("yields every ordering of distinct values in sorted order", () => {
    expect([...permutations([3, 1, 2])]).toEqual([
      [1, 2, 3],
      [1, 3, 2],
      [2, 1, 3],
      [2, 3, 1],
      [3, 1, 2],
      [3, 2, 1],
    ]);
  });

  it("skips orderings that only swap equal values", () => {
    expect([...permutations([2, 1, 1])]).toEqual([
      [1, 1, 2],
      [1, 2, 1],
      [2, 1, 1],
    ]);
    expect([...permutations([4, 4, 4])]).toEqual([[4, 4, 4]]);
  });

  it("yields n! / multiplicities! orderings", () => {
    // 6! / (2! * 2!) = 180
    expect([...permutations([1, 1, 2, 2, 3, 4])]).toHaveLength(180);
  });

  it("yields one empty ordering for empty input", () => {
    expect([...permutations([])]).toEqual([[]]);
  });

  it("does not reorder the caller's array", () => {
    const input = [3, 1, 2];
    [...permutations(input)];
    expect(input).toEqual([3, 1, 2]);
  });

  it("is exhausted after one pass", () => {
    const gen = permutations([1, 2]);
    expect([...gen]).toHaveLength(2);
    expect([...gen]).toEqual([]);
  });
});
