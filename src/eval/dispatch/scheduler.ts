import { evalConfig } from "../config.js";
import { OracleError } from "../errors.js";
import { withRetry } from "../retry.js";
import type { Answer, CallFailure, PromptTemplateId, RawScore } from "../types.js";
import type { EvaluatorClient } from "../models/types.js";
import { logDispatch } from "../../logging.js";
import type { ResourceBudget } from "./budget.js";
import { WorkerPool } from "./pool.js";

export interface SchedulerOptions {
  /** Per-call timeout handed to the evaluator client */
  timeoutMs: number;
  /** Backoff before the single retry of a transient failure */
  retryDelayMs: number;
  /** Retries per call after the first attempt */
  retries: number;
}

export interface ScoreRequestResult {
  /** Successful scores ordered by call index */
  scores: RawScore[];
  failures: CallFailure[];
}

export function schedulerOptionsFromConfig(): SchedulerOptions {
  return {
    timeoutMs: evalConfig.callTimeoutMs,
    retryDelayMs: evalConfig.retryDelayMs,
    retries: 1,
  };
}

function toFailure(callIndex: number, reason: unknown): CallFailure {
  if (reason instanceof OracleError) {
    return { call_index: callIndex, kind: reason.kind, message: reason.message };
  }
  return { call_index: callIndex, kind: "unknown", message: reason instanceof Error ? reason.message : String(reason) };
}

/**
 * Runs evaluator calls on a worker pool sized from the resource budget.
 * A failed call comes back as a CallFailure, never as a rejected batch.
 */
export class DispatchScheduler {
  private readonly pool: WorkerPool;

  constructor(
    private readonly client: EvaluatorClient,
    readonly budget: ResourceBudget,
    private readonly options: SchedulerOptions = schedulerOptionsFromConfig(),
  ) {
    this.pool = new WorkerPool(budget.concurrency);
  }

  get concurrency(): number {
    return this.budget.concurrency;
  }

  get activeCalls(): number {
    return this.pool.active;
  }

  /** Returns a new scheduler over the same client; this one is left untouched. */
  reconfigure(budget: ResourceBudget, options: SchedulerOptions = this.options): DispatchScheduler {
    logDispatch.info({ from: this.budget, to: budget }, "Scheduler reconfigured");
    return new DispatchScheduler(this.client, budget, options);
  }

  /** Split answers into consecutive groups no larger than the concurrency limit. */
  planBatches(answers: readonly Answer[]): Answer[][] {
    const batches: Answer[][] = [];
    for (let i = 0; i < answers.length; i += this.concurrency) {
      batches.push(answers.slice(i, i + this.concurrency));
    }
    return batches;
  }

  /**
   * Issue `count` calls for one answer (call indexes startIndex..startIndex+count-1)
   * and gather whatever succeeds.
   */
  async requestScores(
    answer: Answer,
    templateId: PromptTemplateId,
    count: number,
    startIndex: number = 0,
  ): Promise<ScoreRequestResult> {
    const indexes = Array.from({ length: count }, (_, i) => startIndex + i);
    const settled = await Promise.allSettled(indexes.map((callIndex) => this.callWithRetry(answer, templateId, callIndex)));

    const scores: RawScore[] = [];
    const failures: CallFailure[] = [];
    settled.forEach((r, i) => {
      if (r.status === "fulfilled") scores.push(r.value);
      else failures.push(toFailure(indexes[i], r.reason));
    });
    scores.sort((a, b) => a.call_index - b.call_index);

    if (failures.length > 0) {
      logDispatch.warn(
        { answer_id: answer.id, failed: failures.length, requested: count },
        `[Dispatch] ${scores.length}/${count} calls succeeded for ${answer.id}`,
      );
    }
    return { scores, failures };
  }

  /** Process answers batch by batch; answers within a batch run in parallel. */
  async runBatches<T>(answers: readonly Answer[], handler: (answer: Answer) => Promise<T>): Promise<T[]> {
    const batches = this.planBatches(answers);
    const results: T[] = [];
    for (const [i, batch] of batches.entries()) {
      logDispatch.debug({ batch: i + 1, of: batches.length, size: batch.length }, "Dispatching batch");
      results.push(...(await Promise.all(batch.map(handler))));
    }
    return results;
  }

  private callWithRetry(answer: Answer, templateId: PromptTemplateId, callIndex: number): Promise<RawScore> {
    return withRetry(
      () => this.pool.run(() => this.client.evaluate(answer, templateId, { callIndex, timeoutMs: this.options.timeoutMs })),
      {
        retries: this.options.retries,
        delayMs: this.options.retryDelayMs,
        label: `${this.client.provider} call ${callIndex} for ${answer.id}`,
        shouldRetry: (err) => err instanceof OracleError && err.transient,
      },
    );
  }
}
