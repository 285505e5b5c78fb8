import { UnparseableAnswerError, type AnswerSide } from "../errors.js";
import { parseAnswer } from "./parser.js";
import type { AnswerPair, BatchMetrics, ComparisonResult, ParsedAnswer } from "./types.js";

/**
 * Symmetric mean absolute percentage error on a 0–200 scale.
 * Zero when both numbers are zero; bounded even when one side is near zero.
 */
export function smape(generated: number, expected: number): number {
  if (generated === 0 && expected === 0) return 0;
  return (200 * Math.abs(generated - expected)) / (Math.abs(generated) + Math.abs(expected));
}

function parseSide(answer: string, side: AnswerSide): ParsedAnswer {
  try {
    return parseAnswer(answer);
  } catch (e: unknown) {
    if (e instanceof UnparseableAnswerError) {
      throw new UnparseableAnswerError(`Error comparing answers: ${side} answer "${answer}" has no parseable number`, answer, side);
    }
    throw e;
  }
}

/**
 * Compare a generated display string with the expected one.
 * @throws UnparseableAnswerError naming the side and string that failed
 */
export function compareAnswers(generated: string, expected: string): ComparisonResult {
  const gen = parseSide(generated, "generated");
  const exp = parseSide(expected, "expected");

  return {
    smape: smape(gen.number, exp.number),
    prefix_match: gen.prefix === exp.prefix,
    suffix_match: gen.suffix === exp.suffix,
    decimal_places_match: gen.decimal_places === exp.decimal_places,
  };
}

export interface DetailedBatch {
  metrics: BatchMetrics;
  results: Array<ComparisonResult | null>;
  errors: Array<string | null>;
}

/**
 * Score a batch and keep each pair's result (`null` for pairs that failed).
 *
 * Match rates divide by every submitted pair, so an unparseable pair counts as
 * a miss on all three. SMAPE is averaged over successful comparisons only.
 */
export function evaluateBatchDetailed(pairs: readonly AnswerPair[]): DetailedBatch {
  const total = pairs.length;
  if (total === 0) return { metrics: {}, results: [], errors: [] };

  let prefixMatches = 0;
  let suffixMatches = 0;
  let decimalMatches = 0;
  let smapeSum = 0;
  let compared = 0;
  const results: Array<ComparisonResult | null> = [];
  const errors: Array<string | null> = [];

  for (const [generated, expected] of pairs) {
    try {
      const result = compareAnswers(generated, expected);
      smapeSum += result.smape;
      compared++;
      if (result.prefix_match) prefixMatches++;
      if (result.suffix_match) suffixMatches++;
      if (result.decimal_places_match) decimalMatches++;
      results.push(result);
      errors.push(null);
    } catch (e: unknown) {
      if (!(e instanceof UnparseableAnswerError)) throw e;
      results.push(null);
      errors.push(e.message);
    }
  }

  const metrics: BatchMetrics = {
    prefix_match_rate: prefixMatches / total,
    suffix_match_rate: suffixMatches / total,
    decimal_places_match_rate: decimalMatches / total,
  };
  if (compared > 0) metrics.mean_smape = smapeSum / compared;

  return { metrics, results, errors };
}

/** Aggregate metrics for a batch of (generated, expected) pairs. */
export function evaluateBatch(pairs: readonly AnswerPair[]): BatchMetrics {
  return evaluateBatchDetailed(pairs).metrics;
}
