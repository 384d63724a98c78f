import type { AnswerOutcome, ConsistencyLevel } from "../types.js";
import { mean, round2 } from "./stats.js";

/** Interview-level roll-up of the per-answer results of one batch. */
export interface InterviewSummary {
  answer_count: number;
  scored: number;
  unevaluated: number;
  failed: number;
  degraded: number;
  /** Mean of the scored answers' values; null when nothing was scored */
  overall_score: number | null;
  lowest_score: number | null;
  highest_score: number | null;
  /** Least consistent level among the scored answers */
  consistency: ConsistencyLevel | null;
}

const CONSISTENCY_RANK: Record<ConsistencyLevel, number> = {
  excellent: 0,
  good: 1,
  fair: 2,
  poor: 3,
};

function worstConsistency(levels: readonly ConsistencyLevel[]): ConsistencyLevel | null {
  let worst: ConsistencyLevel | null = null;
  for (const level of levels) {
    if (worst === null || CONSISTENCY_RANK[level] > CONSISTENCY_RANK[worst]) worst = level;
  }
  return worst;
}

/**
 * Summarize a whole interview from its answer outcomes. Unevaluated and
 * failed answers are counted but never pull the overall score.
 */
export function summarizeInterview(outcomes: readonly AnswerOutcome[]): InterviewSummary {
  const values: number[] = [];
  const levels: ConsistencyLevel[] = [];
  let unevaluated = 0;
  let failed = 0;
  let degraded = 0;

  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      failed++;
      continue;
    }
    if (outcome.status === "unevaluated") {
      unevaluated++;
      continue;
    }
    const { final } = outcome;
    if (final.degraded) degraded++;
    if (final.value !== null) values.push(final.value);
    if (final.consistency !== null) levels.push(final.consistency);
  }

  return {
    answer_count: outcomes.length,
    scored: outcomes.length - unevaluated - failed,
    unevaluated,
    failed,
    degraded,
    overall_score: values.length > 0 ? round2(mean(values)) : null,
    lowest_score: values.length > 0 ? Math.min(...values) : null,
    highest_score: values.length > 0 ? Math.max(...values) : null,
    consistency: worstConsistency(levels),
  };
}
