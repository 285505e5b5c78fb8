import { z } from "zod";
import { FormattingInstructionsSchema } from "../../answers/types.js";

export const REQUIRED_RESPONSE_FIELDS = ["formula", "formatting_instructions"] as const;

export const ModelResponseSchema = z.object({
  formula: z.string().min(1),
  formatting_instructions: FormattingInstructionsSchema,
});

export type ModelResponse = z.infer<typeof ModelResponseSchema>;
