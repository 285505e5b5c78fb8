import { z } from "zod";

export const FormattingInstructionsSchema = z.object({
  prefix: z.string().default(""),
  suffix: z.string().default(""),
  rounding: z.number().int().min(0).max(20).default(2),
  multiplier: z.number().finite().default(1),
});

/** How a raw result is rendered: `prefix + value*multiplier (rounded) + suffix`. */
export type FormattingInstructions = z.infer<typeof FormattingInstructionsSchema>;

/** Instructions as callers send them: every field optional, values still checked. */
export const PartialFormattingInstructionsSchema = FormattingInstructionsSchema.partial();

export type PartialFormattingInstructions = z.input<typeof FormattingInstructionsSchema>;

/** A display string split into its parts. */
export interface ParsedAnswer {
  raw_string: string;
  number: number;
  prefix: string;
  suffix: string;
  decimal_places: number;
}

export interface ComparisonResult {
  smape: number;
  prefix_match: boolean;
  suffix_match: boolean;
  decimal_places_match: boolean;
}

/**
 * Aggregate over a batch. Empty for an empty batch; `mean_smape` only when at
 * least one pair compared successfully.
 */
export interface BatchMetrics {
  prefix_match_rate?: number;
  suffix_match_rate?: number;
  decimal_places_match_rate?: number;
  mean_smape?: number;
}

export type AnswerPair = readonly [generated: string, expected: string];
