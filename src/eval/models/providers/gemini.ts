import { GoogleGenAI } from "@google/genai";
import { config } from "../../../config.js";
import { logModel } from "../../../logging.js";
import { SYSTEM_PROMPT } from "../prompt.js";
import type { ModelAnswer } from "../types.js";
import { withRetry, withTimeout } from "../../retry.js";

let genAI: GoogleGenAI | null = null;

function getGenAI(): GoogleGenAI {
  if (!genAI) {
    genAI = new GoogleGenAI({ apiKey: config.gemini.apiKey });
  }
  return genAI;
}

function extractText(response: unknown): string {
  if (typeof response === "object" && response !== null && "text" in response) {
    const maybeText = response.text;
    if (typeof maybeText === "string") {
      return maybeText;
    }
  }
  return "";
}

function extractTokenCount(response: unknown): number {
  if (typeof response !== "object" || response === null || !("usageMetadata" in response)) {
    return 0;
  }

  const usage = response.usageMetadata;
  if (typeof usage !== "object" || usage === null) {
    return 0;
  }

  const total = "totalTokenCount" in usage ? usage.totalTokenCount : undefined;
  return typeof total === "number" ? total : 0;
}

/**
 * Ask Gemini one question. Never throws: a missing key, a timeout or an API
 * failure comes back in `error` with an empty `raw_response`.
 * @param userPrompt The user prompt string
 * @param promptHash Hash of the prompt for provenance
 */
export async function askGemini(userPrompt: string, promptHash: string): Promise<ModelAnswer> {
  const start = Date.now();
  const timestamp = new Date().toISOString();
  const base = {
    model_id: "gemini" as const,
    model_version: config.gemini.model,
    prompt_hash: promptHash,
    timestamp,
  };

  if (!config.gemini.apiKey) {
    return { ...base, raw_response: "", latency_ms: Date.now() - start, error: "GOOGLE_AI_API_KEY not configured", token_count: 0 };
  }

  try {
    const response = await withRetry(
      () =>
        withTimeout(
          getGenAI().models.generateContent({
            model: config.gemini.model,
            contents: userPrompt,
            config: {
              systemInstruction: SYSTEM_PROMPT,
              temperature: config.gemini.temperature,
              topP: config.gemini.topP,
              topK: config.gemini.topK,
              maxOutputTokens: config.gemini.maxOutputTokens,
              responseMimeType: "text/plain",
            },
          }),
          config.gemini.timeoutMs,
          "gemini",
        ),
      { retries: config.gemini.retries, delayMs: config.gemini.retryDelayMs, label: "gemini" },
    );

    const raw = extractText(response);
    if (!raw) {
      return { ...base, raw_response: "", latency_ms: Date.now() - start, error: "Empty response from Gemini", token_count: extractTokenCount(response) };
    }
    return { ...base, raw_response: raw, latency_ms: Date.now() - start, error: null, token_count: extractTokenCount(response) };
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    logModel.error({ err: msg, promptHash }, "Gemini request failed");
    return { ...base, raw_response: "", latency_ms: Date.now() - start, error: msg, token_count: 0 };
  }
}

/** Drop the cached client (tests, key rotation). */
export function resetGeminiClient(): void {
  genAI = null;
}
