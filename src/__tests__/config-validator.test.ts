import { describe, it, expect } from "vitest";
import { validateConfig, type ValidatableConfig } from "../config-validator.js";
import type { EvalConfig } from "../eval/config.js";

const validEval: EvalConfig = {
  provider: "openai",
  anthropicApiKey: "",
  openaiApiKey: "test-openai-key",
  googleAiApiKey: "",
  claudeModel: "claude-test",
  openaiModel: "gpt-test",
  geminiModel: "gemini-test",
  modelTemperature: 0.2,
  callTimeoutMs: 30000,
  retryDelayMs: 500,
  defaultTemplate: "answer_quality",
  ensembleCount: 3,
  quorum: 1,
  outlierIqrMultiplier: 1.5,
  scoreMin: 0,
  scoreMax: 100,
  scoreFloor: 30,
  scoreFloorThreshold: 30,
  scoreFloorBump: 15,
  minAnswerLength: 20,
  placeholderRepeatLimit: 3,
  resourceBudgetTier: null,
  resourceMemoryUnits: null,
  adaptiveDepth: false,
  adaptiveMaxCount: 5,
  adaptiveStdDevThreshold: 12,
};

function cfg(evalOverrides: Partial<EvalConfig> = {}, rest: Partial<ValidatableConfig["rest"]> = {}): ValidatableConfig {
  return {
    rest: { port: 3000, apiKey: "this-is-a-secure-api-key-with-16-chars", ...rest },
    eval: { ...validEval, ...evalOverrides },
  };
}

describe("validateConfig", () => {
  it("should pass validation for a valid config", () => {
    const result = validateConfig(cfg());
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("should return error for invalid REST port", () => {
    expect(validateConfig(cfg({}, { port: 0 })).errors).toContain("REST port must be between 1 and 65535, got 0");
    expect(validateConfig(cfg({}, { port: 65536 })).errors).toContain("REST port must be between 1 and 65535, got 65536");
  });

  it("should warn when the API key is short", () => {
    expect(validateConfig(cfg({}, { apiKey: "short" })).warnings).toEqual([
      "REST API key is only 5 characters (recommended: at least 16)",
    ]);
  });

  it("should not warn when auth is disabled", () => {
    expect(validateConfig(cfg({}, { apiKey: "" })).warnings).toEqual([]);
  });

  it("should bound the ensemble count", () => {
    expect(validateConfig(cfg({ ensembleCount: 0, quorum: 0 })).errors).toContain("ensembleCount must be between 1 and 15, got 0");
    expect(validateConfig(cfg({ ensembleCount: 16 })).errors).toEqual(["ensembleCount must be between 1 and 15, got 16"]);
  });

  it("should keep the quorum within the ensemble", () => {
    expect(validateConfig(cfg({ quorum: 4 })).errors).toEqual(["quorum must be between 1 and ensembleCount (3), got 4"]);
    expect(validateConfig(cfg({ quorum: 0 })).errors).toEqual(["quorum must be between 1 and ensembleCount (3), got 0"]);
  });

  it("should require a positive IQR multiplier", () => {
    expect(validateConfig(cfg({ outlierIqrMultiplier: 0 })).errors).toEqual(["outlierIqrMultiplier must be positive, got 0"]);
  });

  it("should reject a floor below the threshold", () => {
    expect(validateConfig(cfg({ scoreFloor: 25, scoreFloorThreshold: 30 })).errors).toEqual([
      "scoreFloor (25) must be >= scoreFloorThreshold (30)",
    ]);
  });

  it("should keep floor and bump inside the score range", () => {
    expect(validateConfig(cfg({ scoreFloor: 120 })).errors).toEqual(["scoreFloor must be between 0 and 100, got 120"]);
    expect(validateConfig(cfg({ scoreFloorBump: -1 })).errors).toEqual(["scoreFloorBump must be between 0 and 100, got -1"]);
  });

  it("should require positive timeouts", () => {
    expect(validateConfig(cfg({ callTimeoutMs: 0 })).errors).toEqual(["callTimeoutMs must be positive, got 0"]);
  });

  it("should check adaptive depth only when enabled", () => {
    expect(validateConfig(cfg({ adaptiveMaxCount: 2 })).errors).toEqual([]);
    expect(validateConfig(cfg({ adaptiveDepth: true, adaptiveMaxCount: 2 })).errors).toEqual([
      "adaptiveMaxCount (2) must be >= ensembleCount (3)",
    ]);
  });

  it("should reject unparseable adaptive depth settings", () => {
    expect(validateConfig(cfg({ adaptiveDepth: true, adaptiveMaxCount: NaN, adaptiveStdDevThreshold: NaN })).errors).toEqual([
      "adaptiveMaxCount (NaN) must be >= ensembleCount (3)",
      "adaptiveStdDevThreshold must be a non-negative number, got NaN",
    ]);
  });

  it("should warn when the selected provider has no key", () => {
    expect(validateConfig(cfg({ provider: "claude" })).warnings).toEqual([
      'No API key configured for evaluator provider "claude" — every call will fail',
    ]);
  });
});
