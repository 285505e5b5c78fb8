/**
 * The closed instruction set a formula may use. Six binary operations, no
 * more: anything else a model writes is rejected at parse time.
 */

export const OPERATION_NAMES = ["add", "subtract", "multiply", "divide", "exp", "greater"] as const;

export type Operation = (typeof OPERATION_NAMES)[number];

export interface OperationInfo {
  name: Operation;
  signature: string;
  description: string;
}

export const OPERATIONS: readonly OperationInfo[] = [
  { name: "add", signature: "add(x, y)", description: "Returns x + y" },
  { name: "subtract", signature: "subtract(x, y)", description: "Returns x - y" },
  { name: "multiply", signature: "multiply(x, y)", description: "Returns x * y" },
  { name: "divide", signature: "divide(x, y)", description: "Returns x / y" },
  { name: "exp", signature: "exp(x, y)", description: "Returns x raised to power y" },
  { name: "greater", signature: "greater(x, y)", description: "Returns 1 if x > y, otherwise 0" },
];

const OPERATION_SET: ReadonlySet<string> = new Set(OPERATION_NAMES);

export function isOperation(name: string): name is Operation {
  return OPERATION_SET.has(name);
}

/**
 * Apply one operation.
 *
 * `divide` by zero yields +Infinity whatever the dividend's sign. `exp` of a
 * negative base with a fractional exponent yields NaN.
 */
export function applyOperation(op: Operation, x: number, y: number): number {
  switch (op) {
    case "add":
      return x + y;
    case "subtract":
      return x - y;
    case "multiply":
      return x * y;
    case "divide":
      return y === 0 ? Infinity : x / y;
    case "exp":
      return x ** y;
    case "greater":
      return x > y ? 1 : 0;
    default: {
      const unreachable: never = op;
      throw new Error(`Unhandled operation: ${String(unreachable)}`);
    }
  }
}
