import type { config } from "./config.js";
import type { EvalConfig } from "./eval/config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

export interface ValidatableConfig {
  rest: (typeof config)["rest"];
  eval: EvalConfig;
}

const MAX_ENSEMBLE_COUNT = 15;

/**
 * Validates process and scoring configuration before anything is wired.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - ensemble count is 1-15 and quorum is 1..ensembleCount
 * - IQR multiplier is positive
 * - floor, threshold and bump sit inside the score range, and floor >= threshold
 *   (otherwise calibrating a calibrated score would move it again)
 * - timeouts and retry delay are positive
 * - adaptive max count is at least the ensemble count
 * - selected provider has an API key (warning)
 * - API key is at least 16 characters (warning if shorter)
 */
export function validateConfig(cfg: ValidatableConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const ev = cfg.eval;

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  // Warn if API key is too short (non-fatal, but insecure)
  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  if (!Number.isInteger(ev.ensembleCount) || ev.ensembleCount < 1 || ev.ensembleCount > MAX_ENSEMBLE_COUNT) {
    errors.push(`ensembleCount must be between 1 and ${MAX_ENSEMBLE_COUNT}, got ${ev.ensembleCount}`);
  }

  if (!Number.isInteger(ev.quorum) || ev.quorum < 1 || ev.quorum > ev.ensembleCount) {
    errors.push(`quorum must be between 1 and ensembleCount (${ev.ensembleCount}), got ${ev.quorum}`);
  }

  if (!(ev.outlierIqrMultiplier > 0)) {
    errors.push(`outlierIqrMultiplier must be positive, got ${ev.outlierIqrMultiplier}`);
  }

  if (!(ev.scoreMin < ev.scoreMax)) {
    errors.push(`score range is empty: [${ev.scoreMin}, ${ev.scoreMax}]`);
  }

  for (const [name, value] of [
    ["scoreFloor", ev.scoreFloor],
    ["scoreFloorThreshold", ev.scoreFloorThreshold],
  ] as const) {
    if (!isInRange(value, ev.scoreMin, ev.scoreMax)) {
      errors.push(`${name} must be between ${ev.scoreMin} and ${ev.scoreMax}, got ${value}`);
    }
  }

  if (!isInRange(ev.scoreFloorBump, 0, ev.scoreMax - ev.scoreMin)) {
    errors.push(`scoreFloorBump must be between 0 and ${ev.scoreMax - ev.scoreMin}, got ${ev.scoreFloorBump}`);
  }

  if (ev.scoreFloor < ev.scoreFloorThreshold) {
    errors.push(`scoreFloor (${ev.scoreFloor}) must be >= scoreFloorThreshold (${ev.scoreFloorThreshold})`);
  }

  if (!Number.isInteger(ev.minAnswerLength) || ev.minAnswerLength < 0) {
    errors.push(`minAnswerLength must be a non-negative integer, got ${ev.minAnswerLength}`);
  }

  if (!Number.isInteger(ev.placeholderRepeatLimit) || ev.placeholderRepeatLimit < 0) {
    errors.push(`placeholderRepeatLimit must be a non-negative integer, got ${ev.placeholderRepeatLimit}`);
  }

  if (!Number.isInteger(ev.callTimeoutMs) || ev.callTimeoutMs <= 0) {
    errors.push(`callTimeoutMs must be positive, got ${ev.callTimeoutMs}`);
  }

  if (!Number.isInteger(ev.retryDelayMs) || ev.retryDelayMs < 0) {
    errors.push(`retryDelayMs must be non-negative, got ${ev.retryDelayMs}`);
  }

  if (ev.adaptiveDepth) {
    if (!Number.isInteger(ev.adaptiveMaxCount) || ev.adaptiveMaxCount < ev.ensembleCount) {
      errors.push(`adaptiveMaxCount (${ev.adaptiveMaxCount}) must be >= ensembleCount (${ev.ensembleCount})`);
    }
    if (!Number.isFinite(ev.adaptiveStdDevThreshold) || ev.adaptiveStdDevThreshold < 0) {
      errors.push(`adaptiveStdDevThreshold must be a non-negative number, got ${ev.adaptiveStdDevThreshold}`);
    }
  }

  if (ev.resourceMemoryUnits !== null && ev.resourceMemoryUnits < 0) {
    errors.push(`resourceMemoryUnits must be non-negative, got ${ev.resourceMemoryUnits}`);
  }

  if (!providerKey(ev)) {
    warnings.push(`No API key configured for evaluator provider "${ev.provider}" — every call will fail`);
  }

  return { errors, warnings };
}

function providerKey(ev: EvalConfig): string {
  switch (ev.provider) {
    case "openai":
      return ev.openaiApiKey;
    case "claude":
      return ev.anthropicApiKey;
    case "gemini":
      return ev.googleAiApiKey;
  }
}

/**
 * Checks if a port number is in the valid range (1-65535).
 */
function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isInRange(value: number, min: number, max: number): boolean {
  return !isNaN(value) && value >= min && value <= max;
}
