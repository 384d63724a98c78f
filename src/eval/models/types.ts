import type { Answer, PromptTemplateId, ProviderId, RawScore } from "../types.js";

export interface EvaluateOptions {
  /** Position of this call within the answer's ensemble */
  callIndex: number;
  timeoutMs: number;
}

/**
 * Boundary to the external LLM scoring oracle. Implementations keep no
 * mutable state between calls and may be invoked concurrently.
 * Rejects with OracleError on failure, timeout or an unusable response.
 */
export interface EvaluatorClient {
  readonly provider: ProviderId;
  readonly model: string;
  evaluate(answer: Answer, templateId: PromptTemplateId, options: EvaluateOptions): Promise<RawScore>;
}

export interface CompletionRequest {
  system: string;
  user: string;
  signal: AbortSignal;
}

/** One provider SDK reduced to "prompt in, raw text out". */
export interface OracleTransport {
  readonly provider: ProviderId;
  readonly model: string;
  isConfigured(): boolean;
  complete(request: CompletionRequest): Promise<string>;
}
