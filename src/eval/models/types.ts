import type { FormattingInstructions } from "../../answers/types.js";

export type ModelId = "gemini";

/** One model call: the raw text back, or why there is none. */
export interface ModelAnswer {
  model_id: ModelId;
  raw_response: string;
  latency_ms: number;
  error: string | null;
  model_version: string;
  prompt_hash: string;
  token_count: number;
  timestamp: string;
}

export type AskModel = (userPrompt: string, promptHash: string) => Promise<ModelAnswer>;

/** A model response run through the evaluator and formatter. */
export interface ProcessedAnswer {
  formula: string;
  instructions: FormattingInstructions;
  value: number;
  formatted: string;
}
