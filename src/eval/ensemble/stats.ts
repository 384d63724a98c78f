import type { ConsistencyLevel } from "../types.js";

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Quantile by linear interpolation between closest ranks
 * (position = q·(n−1) over the sorted values).
 * @param sorted Values in ascending order
 * @param q Quantile in [0, 1]
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) throw new RangeError("quantile of an empty set");
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new RangeError("mean of an empty set");
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/** Population standard deviation (divisor n). */
export function stdDev(values: readonly number[]): number {
  const m = mean(values);
  const variance = values.reduce((s, v) => s + (v - m) * (v - m), 0) / values.length;
  return Math.sqrt(variance);
}

export function consistencyLevel(sd: number): ConsistencyLevel {
  if (sd < 3) return "excellent";
  if (sd < 7) return "good";
  if (sd < 12) return "fair";
  return "poor";
}
