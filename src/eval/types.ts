// ── Shared types used across the eval subsystem ──────────────────────────

export type ProviderId = "openai" | "claude" | "gemini";

export type ResourceTier = "high" | "medium" | "low";

export const PROMPT_TEMPLATE_IDS = ["answer_quality", "intent_alignment", "final_review"] as const;

export type PromptTemplateId = (typeof PROMPT_TEMPLATE_IDS)[number];

export function isPromptTemplateId(value: unknown): value is PromptTemplateId {
  return typeof value === "string" && (PROMPT_TEMPLATE_IDS as readonly string[]).includes(value);
}

/** A candidate's free-text response. Treated as immutable once submitted. */
export interface Answer {
  readonly id: string;
  readonly text: string;
  readonly question?: string;
  readonly domain?: string;
}

/** One evaluator call's judgment of one answer. Never edited after creation. */
export interface RawScore {
  readonly answer_id: string;
  readonly call_index: number;
  readonly value: number;
  readonly rationale: string;
  readonly latency_ms: number;
  readonly provider: ProviderId;
  readonly model: string;
  readonly template_id: PromptTemplateId;
  readonly prompt_hash: string;
  readonly created_at: string;
}

export type ScoreSet = readonly RawScore[];

export type ConsistencyLevel = "excellent" | "good" | "fair" | "poor";

export interface CallFailure {
  readonly call_index: number;
  readonly kind: string;
  readonly message: string;
}

export interface FinalScore {
  readonly id: string;
  readonly answer_id: string;
  readonly template_id: PromptTemplateId;
  /** Calibrated mean; null only for unevaluated answers */
  readonly value: number | null;
  /** Post-filter mean before calibration */
  readonly mean_raw: number | null;
  /** Population std dev of the surviving scores — lower is more consistent */
  readonly std_dev: number | null;
  readonly consistency: ConsistencyLevel | null;
  readonly outliers_removed: number;
  readonly floor_applied: boolean;
  readonly unevaluated: boolean;
  /** Quorum met but fewer successful calls than requested */
  readonly degraded: boolean;
  readonly adaptive_escalated: boolean;
  readonly requested_calls: number;
  readonly successful_calls: number;
  readonly reason: string | null;
  readonly raw_scores: ScoreSet;
  readonly excluded_call_indexes: readonly number[];
  readonly call_failures: readonly CallFailure[];
  readonly created_at: string;
}

export type AnswerOutcome =
  | { status: "scored"; answer_id: string; final: FinalScore }
  | { status: "unevaluated"; answer_id: string; final: FinalScore }
  | {
      status: "failed";
      answer_id: string;
      error: string;
      succeeded: number;
      requested: number;
      call_failures: readonly CallFailure[];
    };
