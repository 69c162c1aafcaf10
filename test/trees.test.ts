import { describe, expect, it } from "vitest";
import { formatExpr } from "@/lib/expr";
import { buildTrees, treeCount } from "@/lib/trees";
import type { Node } from "@/lib/types";

describe("buildTrees", () => {
  it("yields a single leaf for one number", () => {
    expect([...buildTrees([5])].map(formatExpr)).toEqual(["5"]);
  });

  it("yields nothing for no numbers", () => {
    expect([...buildTrees([])]).toEqual([]);
  });

  it("applies every operator to a pair", () => {
    expect([...buildTrees([1, 2])].map(formatExpr)).toEqual([
      "(1 + 2)",
      "(1 - 2)",
      "(1 × 2)",
      "(1 ÷ 2)",
    ]);
  });

  it("covers every shape and operator assignment", () => {
    // Catalan(n - 1) shapes times 4^(n - 1) operator choices
    expect([...buildTrees([1, 2, 3])]).toHaveLength(2 * 16);
    expect([...buildTrees([1, 2, 3, 4])]).toHaveLength(5 * 64);
  });

  it("repeats groupable trees across split points", () => {
    const sums = [...buildTrees([1, 2, 3])].map(formatExpr).filter((s) => s === "(1 + 2 + 3)");
    expect(sums).toHaveLength(2);
  });

  it("shares subtrees of the same sub-range", () => {
    const trees = [...buildTrees([1, 2, 3, 4])];
    const find = (text: string) => trees.find((t) => formatExpr(t) === text);
    const right = (node: Node | undefined) => (node?.kind === "expr" ? node.operands[1] : undefined);

    const shared = right(find("((1 - 2) - (3 - 4))"));
    expect(shared && formatExpr(shared)).toBe("(3 - 4)");
    expect(right(right(find("(1 - (2 - (3 - 4)))")))).toBe(shared);
  });
});

describe("treeCount", () => {
  it("multiplies orderings, shapes and operator choices", () => {
    expect(treeCount(1)).toBe(1);
    expect(treeCount(2)).toBe(8);
    expect(treeCount(3)).toBe(192);
    expect(treeCount(5)).toBe(430_080);
  });

  it("is zero for no numbers", () => {
    expect(treeCount(0)).toBe(0);
  });
});
