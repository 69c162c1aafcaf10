export type Op = "+" | "-" | "*" | "/";

export type Evaluation = {
  value: bigint;
  valid: boolean;
};

export type Operator = {
  key: Op;
  symbol: string;
  groupable: boolean;
  apply: (a: Evaluation, b: Evaluation) => Evaluation;
};

export type Num = { kind: "num"; value: number };

/** Value and signature are fixed when the node is built; nodes are never mutated. */
export type Expr = {
  kind: "expr";
  op: Op;
  operands: Node[];
  evaluation: Evaluation;
  sig: Signature;
};

export type Node = Num | Expr;

export type Signature = string;

/** Returning "stop" ends the search after the current match. */
export type Sink = (match: string) => void | "stop";

export type SolveReport = {
  matches: string[];
  lines: string[];
  count: number;
};

export type TargetCount = {
  target: number;
  count: number;
};

export type TargetRange = {
  from: number;
  to: number;
};

export type Coverage = {
  upTo: number;
  ranges: TargetRange[];
  firstGap: number | null;
};

export type CombinationCount = {
  numbers: number[];
  count: number;
};

export type Puzzle = {
  target: number;
  numbers: number[];
  solutions: number;
};
