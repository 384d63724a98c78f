import { randomUUID } from "node:crypto";
import { evalConfig, type EvalConfig } from "../config.js";
import { InsufficientEvidenceError } from "../errors.js";
import type { Answer, AnswerOutcome, CallFailure, FinalScore, PromptTemplateId, RawScore } from "../types.js";
import type { DispatchScheduler } from "../dispatch/scheduler.js";
import {
  gatekeeperOptionsFromConfig,
  unevaluatedScore,
  validateAnswer,
  type GatekeeperOptions,
} from "../guardrails/gatekeeper.js";
import { logEval, logGate } from "../../logging.js";
import { calibrate, calibrationPolicyFromConfig, type CalibrationPolicy } from "./calibrator.js";
import { filterOutliers } from "./outlier.js";
import { consistencyLevel, mean, round2, stdDev } from "./stats.js";

export interface AggregationPolicy {
  quorum: number;
  outlierIqrMultiplier: number;
  calibration: CalibrationPolicy;
}

export interface AdaptiveDepthOptions {
  enabled: boolean;
  /** Total calls after escalation */
  maxCount: number;
  /** Escalate when the surviving std dev is above this */
  stdDevThreshold: number;
}

export interface AggregatorOptions {
  ensembleCount: number;
  defaultTemplate: PromptTemplateId;
  policy: AggregationPolicy;
  gatekeeper: GatekeeperOptions;
  adaptive: AdaptiveDepthOptions;
}

export function aggregatorOptionsFromConfig(cfg: EvalConfig = evalConfig): AggregatorOptions {
  return {
    ensembleCount: cfg.ensembleCount,
    defaultTemplate: cfg.defaultTemplate,
    policy: {
      quorum: cfg.quorum,
      outlierIqrMultiplier: cfg.outlierIqrMultiplier,
      calibration: calibrationPolicyFromConfig(cfg),
    },
    gatekeeper: gatekeeperOptionsFromConfig(),
    adaptive: {
      enabled: cfg.adaptiveDepth,
      maxCount: cfg.adaptiveMaxCount,
      stdDevThreshold: cfg.adaptiveStdDevThreshold,
    },
  };
}

export interface ScoreSetInput {
  answer: Answer;
  templateId: PromptTemplateId;
  scores: readonly RawScore[];
  requested: number;
  failures: readonly CallFailure[];
  adaptiveEscalated?: boolean;
}

function degradationReason(requested: number, failures: readonly CallFailure[]): string {
  const kinds = [...new Set(failures.map((f) => f.kind))].join(", ");
  return `degraded: ${failures.length} of ${requested} evaluator calls failed (${kinds})`;
}

/**
 * Synchronous core: quorum check, IQR filter, mean and std dev of the
 * survivors, then floor calibration of the mean. Raw scores are carried
 * through untouched; outliers are only listed as excluded.
 */
export function aggregateScores(input: ScoreSetInput, policy: AggregationPolicy): FinalScore {
  const { answer, templateId, scores, requested, failures } = input;
  const quorum = Math.max(1, policy.quorum);

  if (scores.length < quorum) {
    throw new InsufficientEvidenceError(answer.id, scores.length, requested, quorum, failures);
  }

  const filtered = filterOutliers(
    scores.map((s) => s.value),
    policy.outlierIqrMultiplier,
  );
  const meanRaw = mean(filtered.kept);
  const sd = stdDev(filtered.kept);
  const calibrated = calibrate(meanRaw, policy.calibration);
  const degraded = scores.length < requested;

  return Object.freeze({
    id: randomUUID(),
    answer_id: answer.id,
    template_id: templateId,
    value: round2(calibrated.value),
    mean_raw: round2(meanRaw),
    std_dev: round2(sd),
    consistency: consistencyLevel(sd),
    outliers_removed: filtered.removed.length,
    floor_applied: calibrated.floorApplied,
    unevaluated: false,
    degraded,
    adaptive_escalated: input.adaptiveEscalated ?? false,
    requested_calls: requested,
    successful_calls: scores.length,
    reason: degraded ? degradationReason(requested, failures) : null,
    raw_scores: [...scores],
    excluded_call_indexes: scores.filter((_, i) => !filtered.keep[i]).map((s) => s.call_index),
    call_failures: [...failures],
    created_at: new Date().toISOString(),
  });
}

/**
 * Gatekeeper → scheduler → filter → calibrate, for one answer or many.
 */
export class EnsembleAggregator {
  constructor(
    private readonly scheduler: DispatchScheduler,
    private readonly options: AggregatorOptions = aggregatorOptionsFromConfig(),
  ) {}

  async aggregate(answer: Answer, templateId: PromptTemplateId = this.options.defaultTemplate): Promise<FinalScore> {
    const gate = validateAnswer(answer, this.options.gatekeeper);
    if (!gate.accepted) {
      logGate.info({ answer_id: answer.id, code: gate.code }, `[Gatekeeper] Rejected ${answer.id}: ${gate.reason}`);
      return unevaluatedScore(answer, gate, templateId);
    }
    return this.scoreAccepted(answer, templateId);
  }

  /**
   * Score a set of answers. Rejected answers never reach the scheduler; an
   * answer that misses quorum fails alone without aborting the rest.
   * Outcomes are returned in input order.
   */
  async aggregateMany(answers: readonly Answer[], templateId: PromptTemplateId = this.options.defaultTemplate): Promise<AnswerOutcome[]> {
    const outcomes: Array<AnswerOutcome | null> = answers.map(() => null);
    const accepted: Answer[] = [];
    const acceptedAt: number[] = [];

    answers.forEach((answer, i) => {
      const gate = validateAnswer(answer, this.options.gatekeeper);
      if (gate.accepted) {
        accepted.push(answer);
        acceptedAt.push(i);
        return;
      }
      logGate.info({ answer_id: answer.id, code: gate.code }, `[Gatekeeper] Rejected ${answer.id}: ${gate.reason}`);
      outcomes[i] = { status: "unevaluated", answer_id: answer.id, final: unevaluatedScore(answer, gate, templateId) };
    });

    const scored = await this.scheduler.runBatches(accepted, async (answer): Promise<AnswerOutcome> => {
      try {
        const final = await this.scoreAccepted(answer, templateId);
        return { status: "scored", answer_id: answer.id, final };
      } catch (e: unknown) {
        if (!(e instanceof InsufficientEvidenceError)) throw e;
        return {
          status: "failed",
          answer_id: answer.id,
          error: e.message,
          succeeded: e.succeeded,
          requested: e.requested,
          call_failures: e.failures,
        };
      }
    });
    scored.forEach((outcome, j) => {
      outcomes[acceptedAt[j]] = outcome;
    });

    return outcomes.filter((o): o is AnswerOutcome => o !== null);
  }

  private async scoreAccepted(answer: Answer, templateId: PromptTemplateId): Promise<FinalScore> {
    const { ensembleCount, policy, adaptive } = this.options;
    const first = await this.scheduler.requestScores(answer, templateId, ensembleCount);

    let final: FinalScore;
    try {
      final = aggregateScores({ answer, templateId, scores: first.scores, requested: ensembleCount, failures: first.failures }, policy);
    } catch (e: unknown) {
      if (e instanceof InsufficientEvidenceError) {
        logEval.error({ answer_id: answer.id, failures: e.failures }, `[Ensemble] ${e.message}`);
      }
      throw e;
    }

    const sd = final.std_dev ?? 0;
    if (adaptive.enabled && sd > adaptive.stdDevThreshold && ensembleCount < adaptive.maxCount) {
      const extraCount = adaptive.maxCount - ensembleCount;
      logEval.info(
        { answer_id: answer.id, std_dev: sd, extra_calls: extraCount },
        `[Ensemble] Std dev ${sd} above ${adaptive.stdDevThreshold}, requesting ${extraCount} more calls`,
      );
      const extra = await this.scheduler.requestScores(answer, templateId, extraCount, ensembleCount);
      final = aggregateScores(
        {
          answer,
          templateId,
          scores: [...first.scores, ...extra.scores],
          requested: adaptive.maxCount,
          failures: [...first.failures, ...extra.failures],
          adaptiveEscalated: true,
        },
        policy,
      );
    }

    logEval.info(
      {
        answer_id: answer.id,
        value: final.value,
        std_dev: final.std_dev,
        outliers_removed: final.outliers_removed,
        floor_applied: final.floor_applied,
        degraded: final.degraded,
      },
      `[Ensemble] ${answer.id}: score=${final.value} sd=${final.std_dev} (${final.successful_calls}/${final.requested_calls} calls)`,
    );
    return final;
  }
}
