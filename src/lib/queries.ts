import { combinations } from "./combinations";
import { SolverError, assertInteger, assertNumbers } from "./errors";
import { evaluate } from "./operators";
import { distinctTrees, solve } from "./solver";
import type {
  CombinationCount,
  Coverage,
  SolveReport,
  TargetCount,
  TargetRange,
} from "./types";

export const NO_ANSWERS = "No answers found";

export function countSolutions(numbers: readonly number[], target: number): number {
  let count = 0;
  solve(numbers, target, () => {
    count++;
  });
  return count;
}

/**
 * Answer count for every valid value the hand reaches, from a single pass
 * over its distinct trees. The count for a value equals `countSolutions`
 * for that target.
 */
export function valueCounts(numbers: readonly number[]): Map<bigint, number> {
  assertNumbers(numbers);
  const counts = new Map<bigint, number>();
  for (const tree of distinctTrees(numbers)) {
    const { value, valid } = evaluate(tree);
    if (valid) counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

/** Each match prefixed with its running count, or a single "No answers found" line. */
export function solveReport(numbers: readonly number[], target: number): SolveReport {
  const matches: string[] = [];
  const lines: string[] = [];
  solve(numbers, target, (match) => {
    matches.push(match);
    lines.push(`${matches.length}: ${match}`);
  });
  if (matches.length === 0) lines.push(NO_ANSWERS);
  return { matches, lines, count: matches.length };
}

export type CountWindow = {
  min?: number;
  max?: number;
};

export function resolveWindow({ min = 1, max = Infinity }: CountWindow): { min: number; max: number } {
  if (!Number.isInteger(min) || min < 0) {
    throw new SolverError(`min must be a non-negative integer, got ${min}`);
  }
  if (max !== Infinity && (!Number.isInteger(max) || max < min)) {
    throw new SolverError(`max must be an integer no smaller than min, got ${max}`);
  }
  return { min, max };
}

export type TargetSpan = CountWindow & {
  from: number;
  to: number;
};

export function countByTarget(numbers: readonly number[], span: TargetSpan): TargetCount[] {
  assertNumbers(numbers);
  assertInteger("from", span.from);
  assertInteger("to", span.to);
  if (span.to < span.from) {
    throw new SolverError(`empty target range ${span.from}..${span.to}`);
  }
  const { min, max } = resolveWindow(span);

  const counts = valueCounts(numbers);
  const rows: TargetCount[] = [];
  for (let target = span.from; target <= span.to; target++) {
    const count = counts.get(BigInt(target)) ?? 0;
    if (count >= min && count <= max) rows.push({ target, count });
  }
  return rows;
}

/**
 * Upper bound for a coverage scan. Numbers equal to 1 are summed rather than
 * multiplied, since multiplying by 1 never grows a product.
 */
export function largestTotal(numbers: readonly number[]): number {
  assertNumbers(numbers);
  let ones = 0;
  let product = 0;
  for (const n of numbers) {
    if (n === 1) ones += 1;
    else product = product === 0 ? n : product * n;
  }
  return ones + product;
}

export type CoverageOptions = {
  upTo?: number;
  stopAtFirstGap?: boolean;
};

/** Contiguous runs of achievable targets in 1..upTo. */
export function coverage(numbers: readonly number[], options: CoverageOptions = {}): Coverage {
  const upTo = options.upTo ?? largestTotal(numbers);
  assertNumbers(numbers);
  assertInteger("upTo", upTo);

  const counts = valueCounts(numbers);
  const ranges: TargetRange[] = [];
  let firstGap: number | null = null;
  let open: TargetRange | null = null;

  for (let target = 1; target <= upTo; target++) {
    if (counts.has(BigInt(target))) {
      if (open) open.to = target;
      else open = { from: target, to: target };
      continue;
    }
    if (open) {
      ranges.push(open);
      open = null;
    }
    if (firstGap === null) firstGap = target;
    if (options.stopAtFirstGap) break;
  }
  if (open) ranges.push(open);

  return { upTo, ranges, firstGap };
}

export type CombinationSearch = CountWindow & {
  size: number;
  lowest: number;
  highest: number;
  target: number;
};

/** Every multiset of `size` values from [lowest, highest] whose solution count for `target` lies in the window. */
export function searchCombinations(search: CombinationSearch): CombinationCount[] {
  const { size, lowest, highest, target } = search;
  if (!Number.isInteger(size) || size < 1) {
    throw new SolverError(`size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(lowest) || lowest < 1) {
    throw new SolverError(`lowest must be a positive integer, got ${lowest}`);
  }
  if (!Number.isInteger(highest) || highest < lowest) {
    throw new SolverError(`highest must be an integer no smaller than lowest, got ${highest}`);
  }
  assertInteger("target", target);
  const { min, max } = resolveWindow(search);

  const rows: CombinationCount[] = [];
  for (const numbers of combinations(size, lowest, highest)) {
    const count = countSolutions(numbers, target);
    if (count >= min && count <= max) rows.push({ numbers, count });
  }
  return rows;
}
