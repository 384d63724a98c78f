import { randomUUID } from "node:crypto";
import { evalConfig } from "../config.js";
import type { Answer, FinalScore, PromptTemplateId } from "../types.js";

export type RejectionCode = "empty" | "too_short" | "placeholder" | "repetitive";

/** Deliberate short-circuit, not an error: the answer is not worth an evaluator call. */
export interface ValidationRejection {
  accepted: false;
  code: RejectionCode;
  reason: string;
}

export type GateResult = { accepted: true; reason: null } | ValidationRejection;

export interface GatekeeperOptions {
  minLength: number;
  /** Placeholder occurrences allowed before rejecting */
  placeholderRepeatLimit: number;
}

// Filler only; words that carry meaning in a real answer ("test", "pass") stay out
export const PLACEHOLDER_PHRASES: readonly string[] = [
  "n/a",
  "idk",
  "i don't know",
  "i dont know",
  "no answer",
  "no comment",
  "lorem ipsum",
  "asdf",
  "tbd",
  "...",
];

// Share of all tokens a single token may take before the answer counts as filler
const REPETITION_RATIO = 0.6;
const REPETITION_MIN_TOKENS = 5;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const PLACEHOLDER_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}])(?:${PLACEHOLDER_PHRASES.map(escapeRegExp).join("|")})(?![\\p{L}\\p{N}])`,
  "giu",
);

export function gatekeeperOptionsFromConfig(): GatekeeperOptions {
  return {
    minLength: evalConfig.minAnswerLength,
    placeholderRepeatLimit: evalConfig.placeholderRepeatLimit,
  };
}

export function countPlaceholders(text: string): number {
  return text.match(PLACEHOLDER_PATTERN)?.length ?? 0;
}

function dominantTokenShare(text: string): number {
  const tokens = text.toLowerCase().split(/\s+/).filter((t) => t !== "");
  if (tokens.length < REPETITION_MIN_TOKENS) return 0;
  const counts = new Map<string, number>();
  for (const t of tokens) counts.set(t, (counts.get(t) ?? 0) + 1);
  return Math.max(...counts.values()) / tokens.length;
}

/**
 * Decide whether an answer is worth spending evaluator calls on.
 * Rules run in order and the first hit rejects.
 */
export function validateAnswer(answer: Answer, options: GatekeeperOptions = gatekeeperOptionsFromConfig()): GateResult {
  const text = answer.text.trim();

  if (text === "") {
    return { accepted: false, code: "empty", reason: "answer is empty" };
  }

  const length = [...text].length;
  if (length < options.minLength) {
    return {
      accepted: false,
      code: "too_short",
      reason: `answer has ${length} characters, minimum is ${options.minLength}`,
    };
  }

  const placeholders = countPlaceholders(text);
  const residue = text.replace(PLACEHOLDER_PATTERN, "").replace(/[\s\p{P}]/gu, "");
  if (placeholders > options.placeholderRepeatLimit || (placeholders > 0 && residue === "")) {
    return {
      accepted: false,
      code: "placeholder",
      reason: `answer is placeholder text (${placeholders} placeholder phrase${placeholders === 1 ? "" : "s"})`,
    };
  }

  const share = dominantTokenShare(text);
  if (share > REPETITION_RATIO) {
    return {
      accepted: false,
      code: "repetitive",
      reason: `a single word makes up ${Math.round(share * 100)}% of the answer`,
    };
  }

  return { accepted: true, reason: null };
}

/** Sentinel FinalScore for an answer the gatekeeper turned away. */
export function unevaluatedScore(answer: Answer, rejection: ValidationRejection, templateId: PromptTemplateId): FinalScore {
  return Object.freeze({
    id: randomUUID(),
    answer_id: answer.id,
    template_id: templateId,
    value: null,
    mean_raw: null,
    std_dev: null,
    consistency: null,
    outliers_removed: 0,
    floor_applied: false,
    unevaluated: true,
    degraded: false,
    adaptive_escalated: false,
    requested_calls: 0,
    successful_calls: 0,
    reason: `unevaluated — insufficient content: ${rejection.reason}`,
    raw_scores: [],
    excluded_call_indexes: [],
    call_failures: [],
    created_at: new Date().toISOString(),
  });
}
