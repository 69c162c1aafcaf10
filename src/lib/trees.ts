import { construct, num } from "./expr";
import { OPERATOR_LIST } from "./operators";
import type { Node } from "./types";

/**
 * Every tree over `numbers` in their given order: each split point, each
 * operator, each left subtree with each right subtree. Groupable results
 * repeat across split points; the caller drops them by signature.
 *
 * Subtrees of each sub-range are built once and shared between the trees
 * that contain them. Only the full range is yielded lazily.
 */
export function* buildTrees(numbers: readonly number[]): Generator<Node> {
  if (numbers.length === 0) return;

  const width = numbers.length + 1;
  const built = new Map<number, Node[]>();

  const over = (start: number, end: number): Node[] => {
    const slot = start * width + end;
    const hit = built.get(slot);
    if (hit) return hit;
    const trees = [...combine(numbers, start, end, over)];
    built.set(slot, trees);
    return trees;
  };

  yield* combine(numbers, 0, numbers.length, over);
}

function* combine(
  numbers: readonly number[],
  start: number,
  end: number,
  over: (start: number, end: number) => Node[]
): Generator<Node> {
  if (end - start === 1) {
    const only = numbers[start];
    if (only !== undefined) yield num(only);
    return;
  }
  for (let split = start + 1; split < end; split++) {
    const lefts = over(start, split);
    const rights = over(split, end);
    for (const op of OPERATOR_LIST) {
      for (const left of lefts) {
        for (const right of rights) {
          yield construct(op.key, left, right);
        }
      }
    }
  }
}

/** Trees built over every ordering of `size` distinct numbers: size! × Catalan(size - 1) × 4^(size - 1). */
export function treeCount(size: number): number {
  if (!Number.isInteger(size) || size < 1) return 0;
  let orderings = 1;
  let shapes = 1;
  for (let i = 1; i <= size; i++) orderings *= i;
  for (let i = 0; i < size - 1; i++) shapes = (shapes * 2 * (2 * i + 1)) / (i + 2);
  return orderings * shapes * OPERATOR_LIST.length ** (size - 1);
}
