import { Router, type Response } from "express";
import { z } from "zod";
import { BenchError } from "../errors.js";
import { evaluateNode } from "../formula/evaluator.js";
import { formatFormula, parseFormula } from "../formula/parser.js";
import { OPERATIONS } from "../formula/operations.js";
import { formatAnswer, resolveInstructions } from "../answers/formatter.js";
import { parseAnswer } from "../answers/parser.js";
import { compareAnswers, evaluateBatchDetailed } from "../answers/comparator.js";
import { PartialFormattingInstructionsSchema } from "../answers/types.js";
import { processResponse } from "../eval/models/response.js";
import { getDb, getOutcomesForRun, getRun, listRuns } from "../db/database.js";
import { logRest } from "../logging.js";

export const router = Router();

const FormulaBody = z.object({ formula: z.string() });
const FormatBody = z.object({
  value: z.number(),
  instructions: PartialFormattingInstructionsSchema.default({}),
});
const AnswerBody = z.object({ answer: z.string() });
const CompareBody = z.object({ generated: z.string(), expected: z.string() });
const BatchBody = z.object({
  pairs: z.array(z.tuple([z.string(), z.string()])).max(10_000),
  detailed: z.boolean().default(false),
});
const ResponseBody = z.object({ response: z.string() });

/** Domain errors are the caller's fault (400); anything else is ours (500). */
function sendError(res: Response, e: unknown, route: string): void {
  if (e instanceof z.ZodError) {
    res.status(400).json({ error: e.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "), type: "ValidationError" });
    return;
  }
  if (e instanceof BenchError) {
    res.status(400).json({ error: e.message, type: e.name });
    return;
  }
  const message = e instanceof Error ? e.message : String(e);
  logRest.error({ route, err: message }, "Unhandled route error");
  res.status(500).json({ error: message });
}

router.get("/operations", (_req, res) => {
  res.json({ operations: OPERATIONS });
});

// POST /formula/evaluate — { formula } → { formula, canonical, value }
router.post("/formula/evaluate", (req, res) => {
  try {
    const { formula } = FormulaBody.parse(req.body ?? {});
    const ast = parseFormula(formula);
    const canonical = formatFormula(ast);
    const value = evaluateNode(ast);
    // JSON has no Infinity/NaN; send them as strings
    res.json({ formula, canonical, value: Number.isFinite(value) ? value : String(value) });
  } catch (e: unknown) {
    sendError(res, e, "formula/evaluate");
  }
});

router.post("/answers/format", (req, res) => {
  try {
    const body = FormatBody.parse(req.body ?? {});
    const instructions = resolveInstructions(body.instructions);
    res.json({ formatted: formatAnswer(body.value, instructions), instructions });
  } catch (e: unknown) {
    sendError(res, e, "answers/format");
  }
});

router.post("/answers/parse", (req, res) => {
  try {
    const { answer } = AnswerBody.parse(req.body ?? {});
    res.json(parseAnswer(answer));
  } catch (e: unknown) {
    sendError(res, e, "answers/parse");
  }
});

router.post("/answers/compare", (req, res) => {
  try {
    const { generated, expected } = CompareBody.parse(req.body ?? {});
    res.json(compareAnswers(generated, expected));
  } catch (e: unknown) {
    sendError(res, e, "answers/compare");
  }
});

router.post("/answers/batch", (req, res) => {
  try {
    const { pairs, detailed } = BatchBody.parse(req.body ?? {});
    const batch = evaluateBatchDetailed(pairs);
    if (detailed) res.json(batch);
    else res.json(batch.metrics);
  } catch (e: unknown) {
    sendError(res, e, "answers/batch");
  }
});

// POST /responses/process — raw model output → evaluated, formatted answer
router.post("/responses/process", (req, res) => {
  try {
    const { response } = ResponseBody.parse(req.body ?? {});
    const processed = processResponse(response);
    res.json({ ...processed, value: Number.isFinite(processed.value) ? processed.value : String(processed.value) });
  } catch (e: unknown) {
    sendError(res, e, "responses/process");
  }
});

router.get("/runs", (req, res) => {
  try {
    const limit = Math.min(Math.max(parseInt(String(req.query.limit ?? "20"), 10) || 20, 1), 200);
    res.json({ runs: listRuns(getDb(), limit) });
  } catch (e: unknown) {
    sendError(res, e, "runs");
  }
});

router.get("/runs/:id", (req, res) => {
  try {
    const db = getDb();
    const run = getRun(db, req.params.id);
    if (!run) {
      res.status(404).json({ error: `Run not found: ${req.params.id}` });
      return;
    }
    res.json({ ...run, outcomes: getOutcomesForRun(db, run.id) });
  } catch (e: unknown) {
    sendError(res, e, "runs/:id");
  }
});
