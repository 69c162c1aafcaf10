import type { Evaluation, Node, Op, Operator } from "./types";

const INVALID: Evaluation = { value: 0n, valid: false };

function add(a: Evaluation, b: Evaluation): Evaluation {
  return { value: a.value + b.value, valid: a.valid && b.valid };
}

function sub(a: Evaluation, b: Evaluation): Evaluation {
  return { value: a.value - b.value, valid: a.valid && b.valid && a.value >= b.value };
}

function mul(a: Evaluation, b: Evaluation): Evaluation {
  return { value: a.value * b.value, valid: a.valid && b.valid };
}

function div(a: Evaluation, b: Evaluation): Evaluation {
  if (b.value === 0n) return INVALID;
  return {
    value: a.value / b.value,
    valid: a.valid && b.valid && a.value % b.value === 0n,
  };
}

export const OPERATORS: Readonly<Record<Op, Operator>> = {
  "+": { key: "+", symbol: "+", groupable: true, apply: add },
  "-": { key: "-", symbol: "-", groupable: false, apply: sub },
  "*": { key: "*", symbol: "×", groupable: true, apply: mul },
  "/": { key: "/", symbol: "÷", groupable: false, apply: div },
};

/** Enumeration order used by the tree builder. */
export const OPERATOR_LIST: readonly Operator[] = [
  OPERATORS["+"],
  OPERATORS["-"],
  OPERATORS["*"],
  OPERATORS["/"],
];

export function applyOp(a: Evaluation, op: Op, b: Evaluation): Evaluation {
  return OPERATORS[op].apply(a, b);
}

/** Fold operand evaluations left to right under `op`. */
export function foldOperands(op: Op, operands: readonly Evaluation[]): Evaluation {
  const [first, ...rest] = operands;
  if (first === undefined) return INVALID;
  let acc = first;
  for (const operand of rest) {
    acc = applyOp(acc, op, operand);
  }
  return acc;
}

export function evaluate(node: Node): Evaluation {
  if (node.kind === "num") return { value: BigInt(node.value), valid: true };
  return node.evaluation;
}
