import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { OPERATIONS } from "../formula/operations.js";
import { evaluateFormula } from "../formula/evaluator.js";
import { formatAnswer, resolveInstructions } from "../answers/formatter.js";
import { PartialFormattingInstructionsSchema, type PartialFormattingInstructions } from "../answers/types.js";
import { compareAnswers, evaluateBatchDetailed } from "../answers/comparator.js";
import { processResponse } from "../eval/models/response.js";
import { logMcp } from "../logging.js";

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };
type ToolHandler<T> = (params: T) => Promise<ToolResult>;

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

// JSON has no Infinity/NaN
function jsonNumber(value: number): number | string {
  return Number.isFinite(value) ? value : String(value);
}

// Wrap MCP tool handlers with structured error handling
function withErrorHandling<T>(toolName: string, handler: ToolHandler<T>): ToolHandler<T> {
  return async (params: T) => {
    try {
      return await handler(params);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      logMcp.warn({ tool: toolName, params, error: message }, "MCP tool error");
      return {
        content: [{ type: "text", text: `Error in ${toolName}: ${message}` }],
        isError: true,
      };
    }
  };
}

export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: "finqa-formula-bench",
    version: "1.0.0",
  });

  // --- Tool: list_operations ---
  server.tool(
    "list_operations",
    "List the six binary operations a formula may use.",
    {},
    withErrorHandling("list_operations", async () => jsonResult(OPERATIONS)),
  );

  // --- Tool: evaluate_formula ---
  server.tool(
    "evaluate_formula",
    "Evaluate a nested formula such as divide(subtract(5120, 4800), 4800). Only add, subtract, multiply, divide, exp and greater are allowed, each with exactly two arguments.",
    {
      formula: z.string().describe("Formula to evaluate"),
    },
    withErrorHandling("evaluate_formula", async ({ formula }: { formula: string }) =>
      jsonResult({ formula, value: jsonNumber(evaluateFormula(formula)) }),
    ),
  );

  // --- Tool: format_answer ---
  server.tool(
    "format_answer",
    "Render a number as a display string: multiply, round, then wrap in prefix and suffix.",
    {
      value: z.number().describe("Raw result"),
      ...PartialFormattingInstructionsSchema.shape,
    },
    withErrorHandling(
      "format_answer",
      async ({ value, ...partial }: { value: number } & PartialFormattingInstructions) =>
        jsonResult({ formatted: formatAnswer(value, resolveInstructions(partial)) }),
    ),
  );

  // --- Tool: compare_answers ---
  server.tool(
    "compare_answers",
    "Compare a generated answer string with the expected one. Returns SMAPE (0-200) and whether prefix, suffix and decimal places match.",
    {
      generated: z.string().describe('Generated answer, e.g. "$12.50"'),
      expected: z.string().describe('Expected answer, e.g. "$12.5"'),
    },
    withErrorHandling("compare_answers", async ({ generated, expected }: { generated: string; expected: string }) =>
      jsonResult(compareAnswers(generated, expected)),
    ),
  );

  // --- Tool: evaluate_batch ---
  server.tool(
    "evaluate_batch",
    "Score a list of [generated, expected] answer pairs. Unparseable pairs count as misses for the match rates and are left out of mean SMAPE.",
    {
      pairs: z.array(z.tuple([z.string(), z.string()])).describe("[generated, expected] pairs"),
    },
    withErrorHandling("evaluate_batch", async ({ pairs }: { pairs: Array<[string, string]> }) =>
      jsonResult(evaluateBatchDetailed(pairs)),
    ),
  );

  // --- Tool: process_response ---
  server.tool(
    "process_response",
    "Run a raw model response (JSON with formula and formatting_instructions, optionally fenced) through the evaluator and formatter.",
    {
      response: z.string().describe("Raw model response text"),
    },
    withErrorHandling("process_response", async ({ response }: { response: string }) => {
      const processed = processResponse(response);
      return jsonResult({ ...processed, value: jsonNumber(processed.value) });
    }),
  );

  return server;
}
