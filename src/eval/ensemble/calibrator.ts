import { evalConfig, type EvalConfig } from "../config.js";

export interface CalibrationPolicy {
  /** Scores strictly below this are corrected */
  threshold: number;
  floor: number;
  bump: number;
  /** Declared score range */
  min: number;
  max: number;
}

export interface CalibrationResult {
  value: number;
  floorApplied: boolean;
}

export function calibrationPolicyFromConfig(cfg: EvalConfig = evalConfig): CalibrationPolicy {
  return {
    threshold: cfg.scoreFloorThreshold,
    floor: cfg.scoreFloor,
    bump: cfg.scoreFloorBump,
    min: cfg.scoreMin,
    max: cfg.scoreMax,
  };
}

/**
 * Floor correction for degenerate low scores: below the threshold a score
 * becomes max(floor, score + bump); anything else passes through. The result
 * is clamped to the declared range. Idempotent while floor >= threshold.
 */
export function calibrate(score: number, policy: CalibrationPolicy = calibrationPolicyFromConfig()): CalibrationResult {
  let value = score;
  let floorApplied = false;
  if (score < policy.threshold) {
    value = Math.max(policy.floor, score + policy.bump);
    floorApplied = true;
  }
  value = Math.min(policy.max, Math.max(policy.min, value));
  return { value, floorApplied };
}
