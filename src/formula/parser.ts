/**
 * Formula parser.
 *
 * Grammar:
 *   formula := numeral | name "(" formula "," formula ")"
 *   name    := add | subtract | multiply | divide | exp | greater
 *
 * Whitespace is ignored. Parsing is iterative (an explicit frame stack), so
 * nesting depth is bounded only by memory.
 */

import { MalformedExpressionError, UnknownOperationError } from "../errors.js";
import { isOperation, type Operation } from "./operations.js";

// ── AST ─────────────────────────────────────────────────────────────────

export interface NumberNode {
  type: "number";
  value: number;
}

export interface CallNode {
  type: "call";
  operation: Operation;
  left: FormulaNode;
  right: FormulaNode;
}

export type FormulaNode = NumberNode | CallNode;

// ── Tokenizer ───────────────────────────────────────────────────────────

export type FormulaToken =
  | { kind: "number"; value: number; text: string; index: number }
  | { kind: "name"; text: string; index: number }
  | { kind: "lparen" | "rparen" | "comma"; text: string; index: number };

const NUMERAL = /-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/y;
const NAME = /[A-Za-z_][A-Za-z0-9_]*/y;

export function tokenizeFormula(expression: string): FormulaToken[] {
  const tokens: FormulaToken[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }
    if (char === "(" || char === ")" || char === ",") {
      const kind = char === "(" ? "lparen" : char === ")" ? "rparen" : "comma";
      tokens.push({ kind, text: char, index: i });
      i++;
      continue;
    }

    NUMERAL.lastIndex = i;
    const num = NUMERAL.exec(expression);
    if (num) {
      tokens.push({ kind: "number", value: Number(num[0]), text: num[0], index: i });
      i += num[0].length;
      continue;
    }

    NAME.lastIndex = i;
    const name = NAME.exec(expression);
    if (name) {
      tokens.push({ kind: "name", text: name[0], index: i });
      i += name[0].length;
      continue;
    }

    throw new MalformedExpressionError(
      `Malformed expression: unexpected character '${char}' at position ${i} in "${expression}"`,
      expression,
    );
  }

  return tokens;
}

// ── Parser ──────────────────────────────────────────────────────────────

interface CallFrame {
  operation: Operation;
  args: FormulaNode[];
}

/**
 * Parse a formula into its AST.
 * @throws UnknownOperationError for a call to a name outside the operation set
 * @throws MalformedExpressionError for anything else that is not a formula
 */
export function parseFormula(expression: string): FormulaNode {
  const malformed = (reason: string): MalformedExpressionError =>
    new MalformedExpressionError(`Malformed expression: ${reason} in "${expression}"`, expression);

  const tokens = tokenizeFormula(expression);
  if (tokens.length === 0) throw malformed("empty expression");

  const frames: CallFrame[] = [];
  const roots: FormulaNode[] = [];
  let pos = 0;

  // A completed value either becomes an argument of the open call or the root.
  const complete = (node: FormulaNode): void => {
    const frame = frames[frames.length - 1];
    if (frame) frame.args.push(node);
    else roots.push(node);
  };

  while (pos < tokens.length) {
    // Expecting a value: a numeral or the start of a call
    const token = tokens[pos];
    if (token.kind === "number") {
      complete({ type: "number", value: token.value });
      pos++;
    } else if (token.kind === "name") {
      // A name only means something as the start of a call
      if (tokens[pos + 1]?.kind !== "lparen") {
        throw malformed(`unexpected '${token.text}' at position ${token.index}`);
      }
      if (!isOperation(token.text)) throw new UnknownOperationError(token.text);
      frames.push({ operation: token.text, args: [] });
      pos += 2;
      continue;
    } else {
      throw malformed(`unexpected '${token.text}' at position ${token.index}`);
    }

    // After a value: close finished calls, then expect ',' or end of input
    while (pos < tokens.length) {
      const frame = frames[frames.length - 1];
      const next = tokens[pos];
      if (!frame) {
        throw malformed(`unexpected '${next.text}' at position ${next.index}`);
      }
      if (next.kind === "comma") {
        if (frame.args.length !== 1) {
          throw malformed(`${frame.operation} takes exactly 2 arguments`);
        }
        pos++;
        break;
      }
      if (next.kind === "rparen") {
        if (frame.args.length !== 2) {
          throw malformed(`${frame.operation} takes exactly 2 arguments, got ${frame.args.length}`);
        }
        frames.pop();
        const [left, right] = frame.args;
        complete({ type: "call", operation: frame.operation, left, right });
        pos++;
        continue;
      }
      throw malformed(`unexpected '${next.text}' at position ${next.index}`);
    }
  }

  if (frames.length > 0 || roots.length !== 1) {
    throw malformed("unexpected end of input");
  }
  return roots[0];
}

// ── Printing ────────────────────────────────────────────────────────────

/** Canonical text of a formula: no extra whitespace, ", " between arguments. */
export function formatFormula(root: FormulaNode): string {
  const pending: Array<{ node: FormulaNode; expanded: boolean }> = [{ node: root, expanded: false }];
  const parts: string[] = [];

  let frame = pending.pop();
  while (frame !== undefined) {
    const { node, expanded } = frame;
    if (node.type === "number") {
      parts.push(String(node.value));
    } else if (!expanded) {
      pending.push({ node, expanded: true });
      pending.push({ node: node.right, expanded: false });
      pending.push({ node: node.left, expanded: false });
    } else {
      const right = parts.pop();
      const left = parts.pop();
      if (left === undefined || right === undefined) {
        throw new Error(`Operand stack underflow at ${node.operation}`);
      }
      parts.push(`${node.operation}(${left}, ${right})`);
    }
    frame = pending.pop();
  }

  return parts.join("");
}

/** Nesting depth; a bare numeral has depth 0. */
export function formulaDepth(root: FormulaNode): number {
  const pending: Array<{ node: FormulaNode; depth: number }> = [{ node: root, depth: 0 }];
  let max = 0;

  let item = pending.pop();
  while (item !== undefined) {
    const { node, depth } = item;
    if (node.type === "call") {
      max = Math.max(max, depth + 1);
      pending.push({ node: node.left, depth: depth + 1 });
      pending.push({ node: node.right, depth: depth + 1 });
    }
    item = pending.pop();
  }
  return max;
}
