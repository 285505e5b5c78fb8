import { applyOperation } from "./operations.js";
import { parseFormula, type FormulaNode } from "./parser.js";

/**
 * Evaluate a parsed formula with a post-order walk over an explicit stack.
 * Never recurses, so deep nesting cannot exhaust the call stack.
 */
export function evaluateNode(root: FormulaNode): number {
  const pending: Array<{ node: FormulaNode; expanded: boolean }> = [{ node: root, expanded: false }];
  const values: number[] = [];

  let frame = pending.pop();
  while (frame !== undefined) {
    const { node, expanded } = frame;
    if (node.type === "number") {
      values.push(node.value);
    } else if (!expanded) {
      // Revisit this call once both operands are on the value stack
      pending.push({ node, expanded: true });
      pending.push({ node: node.right, expanded: false });
      pending.push({ node: node.left, expanded: false });
    } else {
      const right = values.pop();
      const left = values.pop();
      if (left === undefined || right === undefined) {
        throw new Error(`Operand stack underflow at ${node.operation}`);
      }
      values.push(applyOperation(node.operation, left, right));
    }
    frame = pending.pop();
  }

  if (values.length !== 1) {
    throw new Error(`Formula evaluation left ${values.length} values on the stack`);
  }
  return values[0];
}

/**
 * Evaluate a formula string, e.g. `divide(subtract(206588, 181001), 181001)`.
 * @throws UnknownOperationError for a call outside the six operations
 * @throws MalformedExpressionError when the input is not a formula
 */
export function evaluateFormula(expression: string): number {
  return evaluateNode(parseFormula(expression));
}
