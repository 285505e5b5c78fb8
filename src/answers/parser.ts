import { UnparseableAnswerError } from "../errors.js";
import type { ParsedAnswer } from "./types.js";

// Prefix: everything before the first digit, '.' or '-'.
// Suffix: everything after the last digit or '.'.
const PREFIX = /^[^\d.-]*/;
const SUFFIX = /[^\d.]*$/;
const NUMERAL = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Split a display string such as `$103.10%` into prefix `$`, number 103.1,
 * suffix `%` and 2 decimal places. Surrounding whitespace is dropped first.
 *
 * @throws UnparseableAnswerError when what lies between the affixes is not a
 *   numeral
 */
export function parseAnswer(answer: string): ParsedAnswer {
  const raw = answer.trim();

  const prefix = PREFIX.exec(raw)?.[0] ?? "";
  const rest = raw.slice(prefix.length);
  const suffix = SUFFIX.exec(rest)?.[0] ?? "";
  const numeral = rest.slice(0, rest.length - suffix.length);

  if (!NUMERAL.test(numeral)) {
    throw new UnparseableAnswerError(`Could not parse number from "${answer}"`, answer);
  }

  const fraction = /\.(\d*)/.exec(numeral);
  return {
    raw_string: raw,
    number: Number(numeral),
    prefix,
    suffix,
    decimal_places: fraction ? fraction[1].length : 0,
  };
}
