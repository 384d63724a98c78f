import { quantile } from "./stats.js";

export interface IqrBounds {
  q1: number;
  q3: number;
  iqr: number;
  lower: number;
  upper: number;
}

export interface OutlierResult {
  /** Surviving values, in input order */
  kept: number[];
  removed: number[];
  /** keep[i] tells whether values[i] survived */
  keep: boolean[];
  /** null when the set was too small to test */
  bounds: IqrBounds | null;
}

export const MIN_OUTLIER_SAMPLE = 3;

/**
 * IQR outlier rejection: keep values within [Q1 − k·IQR, Q3 + k·IQR].
 * Sets smaller than three pass through untouched, and the result is never
 * empty for a non-empty input.
 */
export function filterOutliers(values: readonly number[], multiplier: number = 1.5): OutlierResult {
  const passThrough = (bounds: IqrBounds | null): OutlierResult => ({
    kept: [...values],
    removed: [],
    keep: values.map(() => true),
    bounds,
  });

  if (values.length < MIN_OUTLIER_SAMPLE) return passThrough(null);

  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const bounds: IqrBounds = { q1, q3, iqr, lower: q1 - multiplier * iqr, upper: q3 + multiplier * iqr };

  const keep = values.map((v) => v >= bounds.lower && v <= bounds.upper);
  if (!keep.some(Boolean)) return passThrough(bounds);

  return {
    kept: values.filter((_, i) => keep[i]),
    removed: values.filter((_, i) => !keep[i]),
    keep,
    bounds,
  };
}
