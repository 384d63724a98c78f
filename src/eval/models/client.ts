import { evalConfig } from "../config.js";
import { OracleError } from "../errors.js";
import { TimeoutError, withTimeout } from "../retry.js";
import type { Answer, PromptTemplateId, ProviderId, RawScore } from "../types.js";
import { logOracle } from "../../logging.js";
import { getPromptTemplate, hashPrompt } from "./prompt.js";
import { parseOracleResponse } from "./schema.js";
import type { EvaluateOptions, EvaluatorClient, OracleTransport } from "./types.js";
import { openaiTransport } from "./providers/openai.js";
import { claudeTransport } from "./providers/claude.js";
import { geminiTransport } from "./providers/gemini.js";

export interface ScoreRange {
  min: number;
  max: number;
}

/**
 * Evaluator client over any provider transport. Each call builds its prompt
 * from the template registry, enforces its own timeout and turns every kind
 * of failure into an OracleError.
 */
export class LlmEvaluatorClient implements EvaluatorClient {
  constructor(
    private readonly transport: OracleTransport,
    private readonly range: ScoreRange = { min: evalConfig.scoreMin, max: evalConfig.scoreMax },
  ) {}

  get provider(): ProviderId {
    return this.transport.provider;
  }

  get model(): string {
    return this.transport.model;
  }

  async evaluate(answer: Answer, templateId: PromptTemplateId, options: EvaluateOptions): Promise<RawScore> {
    const { callIndex, timeoutMs } = options;
    const { provider, model } = this.transport;

    if (!this.transport.isConfigured()) {
      throw new OracleError(`${provider} API key not configured`, "not_configured", provider, callIndex);
    }

    const template = getPromptTemplate(templateId);
    const userPrompt = template.buildUserPrompt(answer);
    const promptHash = hashPrompt(templateId, userPrompt);
    const controller = new AbortController();
    const start = Date.now();

    let raw: string;
    try {
      raw = await withTimeout(
        this.transport.complete({ system: template.systemPrompt, user: userPrompt, signal: controller.signal }),
        timeoutMs,
        `${provider} call ${callIndex}`,
        controller,
      );
    } catch (e: unknown) {
      if (e instanceof TimeoutError) {
        throw new OracleError(e.message, "timeout", provider, callIndex, { cause: e });
      }
      const msg = e instanceof Error ? e.message : String(e);
      throw new OracleError(`${provider} request failed: ${msg}`, "request", provider, callIndex, { cause: e });
    }

    const latencyMs = Date.now() - start;
    const parsed = parseOracleResponse(raw, this.range);
    if (!parsed.success) {
      logOracle.debug({ answer_id: answer.id, call_index: callIndex, raw: raw.slice(0, 500) }, "Unusable oracle response");
      throw new OracleError(`${provider} returned an unusable response: ${parsed.error}`, "invalid_response", provider, callIndex);
    }

    return Object.freeze({
      answer_id: answer.id,
      call_index: callIndex,
      value: parsed.data.score,
      rationale: parsed.data.rationale,
      latency_ms: latencyMs,
      provider,
      model,
      template_id: templateId,
      prompt_hash: promptHash,
      created_at: new Date().toISOString(),
    });
  }
}

const TRANSPORTS: Record<ProviderId, OracleTransport> = {
  openai: openaiTransport,
  claude: claudeTransport,
  gemini: geminiTransport,
};

export function createEvaluatorClient(provider: ProviderId = evalConfig.provider): EvaluatorClient {
  return new LlmEvaluatorClient(TRANSPORTS[provider]);
}
