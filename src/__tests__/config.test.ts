import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const clearEnv = () => {
  const keys = [
    "REST_PORT",
    "REST_API_KEY",
    "EVAL_PROVIDER",
    "ENSEMBLE_COUNT",
    "ENSEMBLE_QUORUM",
    "OUTLIER_IQR_MULTIPLIER",
    "SCORE_FLOOR",
    "SCORE_FLOOR_THRESHOLD",
    "SCORE_FLOOR_BUMP",
    "MIN_ANSWER_LENGTH",
    "MODEL_TIMEOUT_MS",
    "RESOURCE_BUDGET_TIER",
    "RESOURCE_MEMORY_UNITS",
    "ADAPTIVE_DEPTH",
    "DEFAULT_PROMPT_TEMPLATE",
  ];
  for (const key of keys) {
    delete process.env[key];
  }
};

const loadConfig = async () => {
  const module = await import("../config.js");
  return module.config;
};

const loadEvalConfig = async () => {
  const module = await import("../eval/config.js");
  return module.evalConfig;
};

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  afterEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  it("defaults the REST port to 3000", async () => {
    const cfg = await loadConfig();
    expect(cfg.rest.port).toBe(3000);
    expect(cfg.rest.apiKey).toBe("");
  });

  it("reads REST_API_KEY into rest.apiKey", async () => {
    vi.stubEnv("REST_API_KEY", "super-secret");
    const cfg = await loadConfig();
    expect(cfg.rest.apiKey).toBe("super-secret");
  });

  it("applies the scoring defaults", async () => {
    const cfg = await loadEvalConfig();
    expect(cfg).toMatchObject({
      provider: "openai",
      ensembleCount: 3,
      quorum: 1,
      outlierIqrMultiplier: 1.5,
      scoreFloor: 30,
      scoreFloorThreshold: 30,
      scoreFloorBump: 15,
      minAnswerLength: 20,
      callTimeoutMs: 30000,
      resourceBudgetTier: null,
      resourceMemoryUnits: null,
      adaptiveDepth: false,
      defaultTemplate: "answer_quality",
    });
  });

  it("lets the threshold follow an overridden floor", async () => {
    vi.stubEnv("SCORE_FLOOR", "40");
    const cfg = await loadEvalConfig();
    expect(cfg.scoreFloor).toBe(40);
    expect(cfg.scoreFloorThreshold).toBe(40);
  });

  it("parses tier, memory units and adaptive depth", async () => {
    vi.stubEnv("RESOURCE_BUDGET_TIER", " Medium ");
    vi.stubEnv("RESOURCE_MEMORY_UNITS", "24");
    vi.stubEnv("ADAPTIVE_DEPTH", "true");
    const cfg = await loadEvalConfig();
    expect(cfg.resourceBudgetTier).toBe("medium");
    expect(cfg.resourceMemoryUnits).toBe(24);
    expect(cfg.adaptiveDepth).toBe(true);
  });

  it("falls back on unknown provider and template names", async () => {
    vi.stubEnv("EVAL_PROVIDER", "mystery");
    vi.stubEnv("DEFAULT_PROMPT_TEMPLATE", "vibes");
    vi.stubEnv("RESOURCE_BUDGET_TIER", "huge");
    const cfg = await loadEvalConfig();
    expect(cfg.provider).toBe("openai");
    expect(cfg.defaultTemplate).toBe("answer_quality");
    expect(cfg.resourceBudgetTier).toBeNull();
  });

  it("selects another provider", async () => {
    vi.stubEnv("EVAL_PROVIDER", "gemini");
    const cfg = await loadEvalConfig();
    expect(cfg.provider).toBe("gemini");
  });
});
