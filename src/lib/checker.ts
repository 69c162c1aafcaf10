import { makeExpr, num } from "./expr";
import { OPERATORS, evaluate } from "./operators";
import type { Node, Op } from "./types";

type Token =
  | { type: "num"; value: number }
  | { type: "op"; op: Op }
  | { type: "open" }
  | { type: "close" }
  | { type: "equals" };

const OP_CHARS: Record<string, Op> = {
  "+": "+",
  "-": "-",
  "−": "-",
  "*": "*",
  "×": "*",
  "/": "/",
  "÷": "/",
};

function tokenize(s: string): Token[] | null {
  const tokens: Token[] = [];
  let i = 0;
  while (i < s.length) {
    const c = s.charAt(i);
    if (/\s/.test(c)) {
      i++;
    } else if (/\d/.test(c)) {
      let j = i;
      while (j < s.length && /\d/.test(s.charAt(j))) j++;
      tokens.push({ type: "num", value: parseInt(s.slice(i, j), 10) });
      i = j;
    } else if (c === "(") {
      tokens.push({ type: "open" });
      i++;
    } else if (c === ")") {
      tokens.push({ type: "close" });
      i++;
    } else if (c === "=") {
      tokens.push({ type: "equals" });
      i++;
    } else {
      const op = OP_CHARS[c];
      if (op === undefined) return null;
      tokens.push({ type: "op", op });
      i++;
    }
  }
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  next(): Token | undefined {
    return this.tokens[this.pos++];
  }

  done(): boolean {
    return this.pos >= this.tokens.length;
  }

  /** NUMBER | "(" expr (op expr)+ ")" with a single operator per group. */
  expr(): Node | null {
    const t = this.next();
    if (t === undefined) return null;
    if (t.type === "num") return num(t.value);
    if (t.type !== "open") return null;

    const first = this.expr();
    if (first === null) return null;
    const operands: Node[] = [first];
    let op: Op | null = null;

    for (;;) {
      const u = this.next();
      if (u === undefined) return null;
      if (u.type === "close") break;
      if (u.type !== "op") return null;
      if (op !== null && u.op !== op) return null;
      op = u.op;
      const operand = this.expr();
      if (operand === null) return null;
      operands.push(operand);
    }

    if (op === null) return null;
    if (!OPERATORS[op].groupable && operands.length !== 2) return null;
    return makeExpr(op, operands);
  }

  /** "= n" suffix, where n may carry a leading minus. */
  claimedValue(): number | null {
    let sign = 1;
    const t = this.peek();
    if (t?.type === "op" && t.op === "-") {
      sign = -1;
      this.next();
    }
    const n = this.next();
    if (n?.type !== "num") return null;
    return sign * n.value;
  }
}

export type ParsedExpression = {
  node: Node;
  claimed: number | null;
};

export function parseExpression(text: string): ParsedExpression | null {
  const tokens = tokenize(text);
  if (tokens === null) return null;
  const parser = new Parser(tokens);
  const node = parser.expr();
  if (node === null) return null;

  let claimed: number | null = null;
  if (parser.peek()?.type === "equals") {
    parser.next();
    claimed = parser.claimedValue();
    if (claimed === null) return null;
  }
  if (!parser.done()) return null;
  return { node, claimed };
}

export function leaves(node: Node): number[] {
  if (node.kind === "num") return [node.value];
  return node.operands.flatMap(leaves);
}

/** True if `text` evaluates exactly to `target` using each of `numbers` once. */
export function checkExpression(text: string, numbers: readonly number[], target: number): boolean {
  if (!Number.isSafeInteger(target)) return false;
  const parsed = parseExpression(text);
  if (parsed === null) return false;
  if (parsed.claimed !== null && parsed.claimed !== target) return false;

  const { value, valid } = evaluate(parsed.node);
  if (!valid || value !== BigInt(target)) return false;

  const used = leaves(parsed.node).sort((a, b) => a - b);
  const want = [...numbers].sort((a, b) => a - b);
  if (used.length !== want.length) return false;
  return used.every((n, i) => n === want[i]);
}
