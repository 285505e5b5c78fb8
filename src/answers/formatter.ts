import {
  FormattingInstructionsSchema,
  type FormattingInstructions,
  type PartialFormattingInstructions,
} from "./types.js";

/**
 * Fill in defaults (`""`, `""`, 2, 1) and check the instruction values.
 * Throws a ZodError when rounding is negative or not an integer.
 */
export function resolveInstructions(partial: PartialFormattingInstructions = {}): FormattingInstructions {
  return FormattingInstructionsSchema.parse(partial);
}

/**
 * Round half away from zero, on the decimal reading of the value:
 * `roundHalfAwayFromZero(1.005, 2) === 1.01` even though 1.005 is stored as
 * 1.00499999999999989...
 */
export function roundHalfAwayFromZero(value: number, places: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** places;
  const scaled = Math.abs(value) * factor;
  if (scaled >= Number.MAX_SAFE_INTEGER) return value;
  const rounded = Math.round(scaled * (1 + Number.EPSILON));
  return (Math.sign(value) * rounded) / factor;
}

/**
 * Render a result for display.
 *
 * The multiplier is applied first, then rounding, then the numeral is printed
 * with exactly `rounding` decimals and wrapped in the affixes. The prefix goes
 * before the sign: -5 with prefix "$" renders as `$-5.00`.
 */
export function formatAnswer(value: number, instructions: FormattingInstructions): string {
  const { prefix, suffix, rounding, multiplier } = instructions;
  const rounded = roundHalfAwayFromZero(value * multiplier, rounding);
  return `${prefix}${toFixedDigits(rounded, rounding)}${suffix}`;
}

// toFixed switches to exponent notation from 1e21 up; doubles that large are
// integers, so BigInt prints every digit.
function toFixedDigits(value: number, places: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Math.abs(value) < 1e21) return value.toFixed(places);
  const digits = BigInt(value).toString();
  return places > 0 ? `${digits}.${"0".repeat(places)}` : digits;
}
