import { OPERATORS, evaluate, foldOperands } from "./operators";
import type { Expr, Node, Num, Op, Signature } from "./types";

export function num(value: number): Num {
  return { kind: "num", value };
}

/** An n-ary node over `operands` as given, with its value and signature computed once. */
export function makeExpr(op: Op, operands: Node[]): Expr {
  return {
    kind: "expr",
    op,
    operands,
    evaluation: foldOperands(op, operands.map(evaluate)),
    sig: `${op}(${operands.map(signature).join(",")})`,
  };
}

function flatten(node: Node, op: Op): Node[] {
  if (node.kind === "expr" && node.op === op) {
    return node.operands.flatMap((child) => flatten(child, op));
  }
  return [node];
}

export type Keyed = { node: Node; value: bigint; literal: boolean; sig: Signature };

function keyed(node: Node): Keyed {
  const ev = evaluate(node);
  return {
    node,
    value: ev.valid ? ev.value : 0n,
    literal: node.kind === "num",
    sig: signature(node),
  };
}

/** Operand order inside a groupable node: by value, a literal before a sub-expression of equal value, then by signature. */
export function sortKeyCompare(a: Keyed, b: Keyed): number {
  if (a.value !== b.value) return a.value < b.value ? -1 : 1;
  if (a.literal !== b.literal) return a.literal ? -1 : 1;
  if (a.sig === b.sig) return 0;
  return a.sig < b.sig ? -1 : 1;
}

/**
 * Combine two operands under `op`. Groupable operators absorb same-operator
 * operands into one n-ary node and sort them, so every grouping and ordering
 * of the same operands yields the same node.
 */
export function construct(op: Op, left: Node, right: Node): Expr {
  if (!OPERATORS[op].groupable) {
    return makeExpr(op, [left, right]);
  }
  const operands = [...flatten(left, op), ...flatten(right, op)]
    .map(keyed)
    .sort(sortKeyCompare)
    .map((k) => k.node);
  return makeExpr(op, operands);
}

export function signature(node: Node): Signature {
  return node.kind === "num" ? node.value.toString() : node.sig;
}

/** Fully parenthesized infix: `(x op y op z)`, a bare number for a leaf. */
export function formatExpr(node: Node): string {
  if (node.kind === "num") return node.value.toString();
  const sym = OPERATORS[node.op].symbol;
  return `(${node.operands.map(formatExpr).join(` ${sym} `)})`;
}

export function formatMatch(node: Node, target: number): string {
  return `${formatExpr(node)} = ${target}`;
}
