import { assertInteger, assertNumbers } from "./errors";
import { formatMatch, signature } from "./expr";
import { evaluate } from "./operators";
import { permutations } from "./permutations";
import { buildTrees } from "./trees";
import type { Node, Signature, Sink } from "./types";

/**
 * Each tree over `numbers` whose signature has not been seen yet in this
 * call, across every distinct ordering.
 */
export function* distinctTrees(numbers: readonly number[]): Generator<Node> {
  const seen = new Set<Signature>();
  for (const ordering of permutations(numbers)) {
    for (const tree of buildTrees(ordering)) {
      const sig = signature(tree);
      if (seen.has(sig)) continue;
      seen.add(sig);
      yield tree;
    }
  }
}

/**
 * Emit every semantically distinct expression over `numbers` (each used once)
 * that evaluates to `target`. Trees already seen in this call, under any
 * permutation, are skipped before evaluation.
 */
export function solve(numbers: readonly number[], target: number, sink: Sink): void {
  assertNumbers(numbers);
  assertInteger("target", target);

  const goal = BigInt(target);
  for (const tree of distinctTrees(numbers)) {
    const { value, valid } = evaluate(tree);
    if (!valid || value !== goal) continue;
    if (sink(formatMatch(tree, target)) === "stop") return;
  }
}

export function solveAll(numbers: readonly number[], target: number): string[] {
  const matches: string[] = [];
  solve(numbers, target, (match) => {
    matches.push(match);
  });
  return matches;
}

export function hasSolution(numbers: readonly number[], target: number): boolean {
  let found = false;
  solve(numbers, target, () => {
    found = true;
    return "stop";
  });
  return found;
}
