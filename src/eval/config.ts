import type { PromptTemplateId, ProviderId, ResourceTier } from "./types.js";
import { isPromptTemplateId } from "./types.js";

export interface EvalConfig {
  provider: ProviderId;
  anthropicApiKey: string;
  openaiApiKey: string;
  googleAiApiKey: string;
  claudeModel: string;
  openaiModel: string;
  geminiModel: string;
  modelTemperature: number;
  callTimeoutMs: number;
  retryDelayMs: number;
  defaultTemplate: PromptTemplateId;

  // Ensemble
  ensembleCount: number;
  quorum: number;
  outlierIqrMultiplier: number;

  // Calibration (declared score range is [scoreMin, scoreMax])
  scoreMin: number;
  scoreMax: number;
  scoreFloor: number;
  scoreFloorThreshold: number;
  scoreFloorBump: number;

  // Gatekeeper
  minAnswerLength: number;
  placeholderRepeatLimit: number;

  // Dispatch
  resourceBudgetTier: ResourceTier | null;
  resourceMemoryUnits: number | null;

  // Adaptive depth
  adaptiveDepth: boolean;
  adaptiveMaxCount: number;
  adaptiveStdDevThreshold: number;
}

function parseProvider(value: string | undefined): ProviderId {
  if (value === "claude" || value === "gemini") return value;
  return "openai";
}

function parseTier(value: string | undefined): ResourceTier | null {
  const v = value?.trim().toLowerCase();
  if (v === "high" || v === "medium" || v === "low") return v;
  return null;
}

function parseOptionalNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const n = parseFloat(value);
  return Number.isFinite(n) ? n : null;
}

const scoreFloor = parseFloat(process.env.SCORE_FLOOR ?? "30");
const template = process.env.DEFAULT_PROMPT_TEMPLATE ?? "answer_quality";

export const evalConfig: EvalConfig = {
  provider: parseProvider(process.env.EVAL_PROVIDER),
  anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? "",
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  googleAiApiKey: process.env.GOOGLE_AI_API_KEY ?? "",

  claudeModel: process.env.CLAUDE_MODEL ?? "claude-sonnet-4-20250514",
  openaiModel: process.env.OPENAI_MODEL ?? "gpt-4o",
  geminiModel: process.env.GEMINI_MODEL ?? "gemini-2.5-flash",

  modelTemperature: parseFloat(process.env.MODEL_TEMPERATURE ?? "0.2"),
  callTimeoutMs: parseInt(process.env.MODEL_TIMEOUT_MS ?? "30000", 10),
  retryDelayMs: parseInt(process.env.RETRY_DELAY_MS ?? "500", 10),
  defaultTemplate: isPromptTemplateId(template) ? template : "answer_quality",

  ensembleCount: parseInt(process.env.ENSEMBLE_COUNT ?? "3", 10),
  quorum: parseInt(process.env.ENSEMBLE_QUORUM ?? "1", 10),
  outlierIqrMultiplier: parseFloat(process.env.OUTLIER_IQR_MULTIPLIER ?? "1.5"),

  scoreMin: 0,
  scoreMax: 100,
  scoreFloor,
  scoreFloorThreshold: parseFloat(process.env.SCORE_FLOOR_THRESHOLD ?? String(scoreFloor)),
  scoreFloorBump: parseFloat(process.env.SCORE_FLOOR_BUMP ?? "15"),

  minAnswerLength: parseInt(process.env.MIN_ANSWER_LENGTH ?? "20", 10),
  placeholderRepeatLimit: parseInt(process.env.PLACEHOLDER_REPEAT_LIMIT ?? "3", 10),

  resourceBudgetTier: parseTier(process.env.RESOURCE_BUDGET_TIER),
  resourceMemoryUnits: parseOptionalNumber(process.env.RESOURCE_MEMORY_UNITS),

  adaptiveDepth: (process.env.ADAPTIVE_DEPTH ?? "false") === "true",
  adaptiveMaxCount: parseInt(process.env.ADAPTIVE_MAX_COUNT ?? "5", 10),
  adaptiveStdDevThreshold: parseFloat(process.env.ADAPTIVE_STD_DEV_THRESHOLD ?? "12"),
};
