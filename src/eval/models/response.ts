/**
 * Model response handling.
 *
 * Models answer with a JSON object holding a formula and formatting
 * instructions, often wrapped in a ```json fence. This module unwraps and
 * validates that object, then runs it through the evaluator and formatter.
 */

import { MalformedResponseError, MissingFieldError, errorMessage } from "../../errors.js";
import { evaluateFormula } from "../../formula/evaluator.js";
import { formatAnswer } from "../../answers/formatter.js";
import { ModelResponseSchema, REQUIRED_RESPONSE_FIELDS, type ModelResponse } from "./schema.js";
import type { ProcessedAnswer } from "./types.js";

const FENCE_OPEN = /^```[\w-]*[ \t]*\r?\n?/;
const FENCE_CLOSE = /\r?\n?```$/;

/** Drop surrounding whitespace and a leading/trailing code fence. */
export function stripCodeFence(text: string): string {
  return text.trim().replace(FENCE_OPEN, "").replace(FENCE_CLOSE, "").trim();
}

/**
 * Parse a model response into its formula and resolved formatting instructions.
 * @throws MalformedResponseError when the text is not a JSON object or a field has the wrong shape
 * @throws MissingFieldError when `formula` or `formatting_instructions` is absent
 */
export function parseModelResponse(text: string): ModelResponse {
  const body = stripCodeFence(text);

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (e: unknown) {
    throw new MalformedResponseError(`Invalid JSON format in model response: ${errorMessage(e)}`, text);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new MalformedResponseError("Model response must be a JSON object", text);
  }

  for (const field of REQUIRED_RESPONSE_FIELDS) {
    if (!(field in parsed)) throw new MissingFieldError(field);
  }

  const result = ModelResponseSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new MalformedResponseError(`Schema validation failed: ${issues}`, text);
  }
  return result.data;
}

/**
 * Parse, evaluate and format one model response.
 * Throws whatever the failing stage throws; callers record it per question.
 */
export function processResponse(text: string): ProcessedAnswer {
  const { formula, formatting_instructions: instructions } = parseModelResponse(text);
  const value = evaluateFormula(formula);
  return { formula, instructions, value, formatted: formatAnswer(value, instructions) };
}
