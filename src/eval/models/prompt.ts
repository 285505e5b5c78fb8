import { createHash } from "node:crypto";
import { OPERATIONS } from "../../formula/operations.js";

const operationList = OPERATIONS.map((op) => `- ${op.signature}: ${op.description}`).join("\n");

export const SYSTEM_PROMPT = `You are a financial analyst, and an expert in reading and performing numerical analysis on financial reports.

You will receive text from a financial report, a table from the same report, and a question about that data. Respond with:

1. A formula that calculates the answer using only these operations:
${operationList}

Rules:
- Each operation takes exactly 2 arguments
- Operations may be nested, e.g. divide(subtract(5120, 4800), 4800)
- Use only the operations listed above and plain decimal numbers: no variables, no other functions, no thousands separators

2. Formatting instructions for the result, chosen from the question and the supporting data:
- prefix: string placed before the number (e.g. "$" for currency); "" if none
- suffix: string placed after the number (e.g. "%" for percentages); "" if none
- rounding: number of decimal places to round to (e.g. 2); 0 for whole numbers
- multiplier: number the result is multiplied by (e.g. 100 for percentages); 1 if none

You MUST respond with ONLY a JSON object of this shape. No explanation outside the JSON.

Example question: what was the percentage change in net revenue from 2018 to 2019?
(table shows net revenue of 4800 in 2018 and 5120 in 2019)

{
  "formula": "divide(subtract(5120, 4800), 4800)",
  "formatting_instructions": {
    "prefix": "",
    "suffix": "%",
    "rounding": 2,
    "multiplier": 100
  }
}`;

export interface QuestionContext {
  preText: readonly string[];
  postText: readonly string[];
  table: readonly (readonly string[])[];
  question: string;
}

function renderTable(table: QuestionContext["table"]): string {
  return table.map((row) => row.join(" | ")).join("\n");
}

/**
 * Construct the user prompt for one question. Each question carries its full
 * report context; there is no conversation state between questions.
 * @returns Formatted prompt string
 */
export function buildQuestionPrompt(context: QuestionContext): string {
  let prompt = "pre_text:\n```\n";
  prompt += context.preText.join("\n");
  prompt += "\n```\npost_text:\n```\n";
  prompt += context.postText.join("\n");
  prompt += "\n```\ntable:\n```\n";
  prompt += renderTable(context.table);
  prompt += "\n```\nquestion:\n";
  prompt += context.question;
  return prompt;
}

/**
 * Generate a short hash of the prompt, recorded with every model answer so
 * results from different prompt versions can be told apart.
 * @param userPrompt The user prompt string
 * @returns First 16 chars of SHA-256 hex digest
 */
export function hashPrompt(userPrompt: string): string {
  const combined = SYSTEM_PROMPT + "\n---\n" + userPrompt;
  return createHash("sha256").update(combined).digest("hex").slice(0, 16);
}
