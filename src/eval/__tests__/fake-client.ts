import { OracleError } from "../errors.js";
import type { EvaluateOptions, EvaluatorClient } from "../models/types.js";
import type { Answer, PromptTemplateId, RawScore } from "../types.js";

/** Score to return, or an error to throw, for one attempt of one call. */
export type ScriptStep = number | Error;

export type Script = (answer: Answer, callIndex: number, attempt: number) => ScriptStep;

/**
 * In-process evaluator for scheduler and aggregator tests. Every attempt is
 * recorded, and an optional delay keeps calls in flight long enough to
 * observe concurrency.
 */
export class ScriptedClient implements EvaluatorClient {
  readonly provider = "openai";
  readonly model = "scripted-model";
  readonly attempts: Array<{ answerId: string; callIndex: number }> = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly script: Script,
    private readonly delayMs: number = 0,
  ) {}

  attemptsFor(answerId: string, callIndex: number): number {
    return this.attempts.filter((a) => a.answerId === answerId && a.callIndex === callIndex).length;
  }

  async evaluate(answer: Answer, templateId: PromptTemplateId, options: EvaluateOptions): Promise<RawScore> {
    const attempt = this.attemptsFor(answer.id, options.callIndex);
    this.attempts.push({ answerId: answer.id, callIndex: options.callIndex });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) await new Promise((r) => setTimeout(r, this.delayMs));
      const step = this.script(answer, options.callIndex, attempt);
      if (step instanceof Error) throw step;
      return {
        answer_id: answer.id,
        call_index: options.callIndex,
        value: step,
        rationale: `scripted score ${step}`,
        latency_ms: this.delayMs,
        provider: this.provider,
        model: this.model,
        template_id: templateId,
        prompt_hash: "0000000000000000",
        created_at: "2026-01-15T10:00:00.000Z",
      };
    } finally {
      this.inFlight--;
    }
  }
}

export function oracleFailure(kind: OracleError["kind"], callIndex: number, message: string = `${kind} failure`): OracleError {
  return new OracleError(message, kind, "openai", callIndex);
}

/** Fixed scores by call index; indexes past the end repeat the last value. */
export function scoresByIndex(values: readonly number[]): Script {
  return (_answer, callIndex) => values[Math.min(callIndex, values.length - 1)];
}

export function rawScore(callIndex: number, value: number, answerId: string = "a1"): RawScore {
  return {
    answer_id: answerId,
    call_index: callIndex,
    value,
    rationale: `score ${value}`,
    latency_ms: 120,
    provider: "openai",
    model: "scripted-model",
    template_id: "answer_quality",
    prompt_hash: "0000000000000000",
    created_at: "2026-01-15T10:00:00.000Z",
  };
}
