import { Router, type Request, type Response } from "express";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { EnsembleAggregator } from "../eval/ensemble/aggregator.js";
import { InsufficientEvidenceError } from "../eval/errors.js";
import { summarizeInterview } from "../eval/ensemble/summary.js";
import { PROMPT_TEMPLATE_IDS, type Answer, type AnswerOutcome, type FinalScore } from "../eval/types.js";
import type { EvaluationStore } from "../db/evaluation-store.js";
import { logRest } from "../logging.js";

export interface RouteDeps {
  aggregator: Pick<EnsembleAggregator, "aggregate" | "aggregateMany">;
  store: Pick<EvaluationStore, "saveFinalScore" | "saveFinalScores" | "getEvaluation" | "consistencyReport">;
}

const AnswerBodySchema = z.object({
  id: z.string().min(1).max(200).optional(),
  text: z.string(),
  question: z.string().max(4000).optional(),
  domain: z.string().max(200).optional(),
});

const EvaluateBodySchema = AnswerBodySchema.extend({
  template: z.enum(PROMPT_TEMPLATE_IDS).optional(),
});

const BatchBodySchema = z.object({
  answers: z.array(AnswerBodySchema).min(1).max(100),
  template: z.enum(PROMPT_TEMPLATE_IDS).optional(),
});

const ConsistencyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function toAnswer(body: z.infer<typeof AnswerBodySchema>): Answer {
  return {
    id: body.id ?? randomUUID(),
    text: body.text,
    question: body.question,
    domain: body.domain,
  };
}

function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: "invalid request",
    issues: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`),
  });
}

function sendServerError(req: Request, res: Response, e: unknown): void {
  const message = e instanceof Error ? e.message : String(e);
  logRest.error({ err: e, path: req.path }, `Unhandled error on ${req.method} ${req.path}: ${message}`);
  res.status(500).json({ error: "internal error" });
}

export function createEvaluationRouter(deps: RouteDeps): Router {
  const router = Router();

  // POST /evaluate — score a single answer
  router.post("/evaluate", async (req, res) => {
    const parsed = EvaluateBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const answer = toAnswer(parsed.data);
    try {
      const final = await deps.aggregator.aggregate(answer, parsed.data.template);
      deps.store.saveFinalScore(final, answer);
      res.json(final);
    } catch (e: unknown) {
      if (e instanceof InsufficientEvidenceError) {
        res.status(422).json({
          error: "could not evaluate",
          answer_id: e.answerId,
          message: e.message,
          succeeded: e.succeeded,
          requested: e.requested,
          call_failures: e.failures,
        });
        return;
      }
      sendServerError(req, res, e);
    }
  });

  // POST /evaluate/batch — score many answers (one interview); each fails on its own
  router.post("/evaluate/batch", async (req, res) => {
    const parsed = BatchBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const answers = parsed.data.answers.map(toAnswer);
    try {
      const outcomes: AnswerOutcome[] = await deps.aggregator.aggregateMany(answers, parsed.data.template);
      const toStore: Array<{ final: FinalScore; answer: Answer }> = [];
      outcomes.forEach((outcome, i) => {
        if (outcome.status !== "failed") toStore.push({ final: outcome.final, answer: answers[i] });
      });
      deps.store.saveFinalScores(toStore);

      const overall = summarizeInterview(outcomes);
      res.json({
        count: overall.answer_count,
        scored: overall.scored,
        unevaluated: overall.unevaluated,
        failed: overall.failed,
        overall,
        outcomes,
      });
    } catch (e: unknown) {
      sendServerError(req, res, e);
    }
  });

  // GET /evaluations/:id
  router.get("/evaluations/:id", (req, res) => {
    const final = deps.store.getEvaluation(req.params.id);
    if (!final) {
      res.status(404).json({ error: `evaluation ${req.params.id} not found` });
      return;
    }
    res.json(final);
  });

  // GET /consistency?limit=
  router.get("/consistency", (req, res) => {
    const parsed = ConsistencyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    res.json(deps.store.consistencyReport(parsed.data.limit));
  });

  return router;
}
