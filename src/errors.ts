/**
 * Error classes for the formula and answer pipeline.
 *
 * Core functions throw these at the point of detection. Per-item callers
 * (batch scoring, the benchmark runner, REST and MCP handlers) catch them,
 * record the message and move on to the next item.
 */

/**
 * Base class for every error raised by the bench.
 */
export class BenchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BenchError";
  }
}

// =============================================================================
// Formula errors
// =============================================================================

/**
 * Raised when a formula cannot be reduced to a number: bad syntax, wrong
 * argument count, trailing input or an empty string.
 */
export class MalformedExpressionError extends BenchError {
  readonly expression: string;

  constructor(message: string, expression: string) {
    super(message);
    this.name = "MalformedExpressionError";
    this.expression = expression;
  }
}

/**
 * Raised when a formula calls a name outside the six-operation set.
 */
export class UnknownOperationError extends BenchError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Unknown operation: ${operation}`);
    this.name = "UnknownOperationError";
    this.operation = operation;
  }
}

// =============================================================================
// Answer errors
// =============================================================================

export type AnswerSide = "generated" | "expected";

/**
 * Raised when a display string cannot be split into prefix, number and suffix.
 */
export class UnparseableAnswerError extends BenchError {
  readonly input: string;
  side?: AnswerSide;

  constructor(message: string, input: string, side?: AnswerSide) {
    super(message);
    this.name = "UnparseableAnswerError";
    this.input = input;
    this.side = side;
  }
}

// =============================================================================
// Model response errors
// =============================================================================

/**
 * Raised when a model response lacks `formula` or `formatting_instructions`.
 */
export class MissingFieldError extends BenchError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing required field in model response: ${field}`);
    this.name = "MissingFieldError";
    this.field = field;
  }
}

/**
 * Raised when a model response is not valid JSON after fence stripping, or
 * its fields have the wrong shape.
 */
export class MalformedResponseError extends BenchError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = "MalformedResponseError";
    this.raw = raw;
  }
}

/** Message of any thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
