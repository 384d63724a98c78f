import os from "node:os";
import type { ResourceTier } from "../types.js";

/** Read-only for the lifetime of a scheduler; reconfiguring means a new scheduler. */
export interface ResourceBudget {
  readonly tier: ResourceTier;
  readonly memoryUnits: number;
  readonly concurrency: number;
}

// Representative memory units for an explicitly requested tier
const TIER_MEMORY_UNITS: Record<ResourceTier, number> = {
  high: 20,
  medium: 10,
  low: 4,
};

export function concurrencyForMemory(units: number): number {
  if (units >= 20) return 16;
  if (units >= 10) return 8;
  return 4;
}

export function tierForMemory(units: number): ResourceTier {
  if (units >= 20) return "high";
  if (units >= 10) return "medium";
  return "low";
}

export function createResourceBudget(memoryUnits: number): ResourceBudget {
  const units = Number.isFinite(memoryUnits) && memoryUnits > 0 ? memoryUnits : 0;
  return Object.freeze({
    tier: tierForMemory(units),
    memoryUnits: units,
    concurrency: concurrencyForMemory(units),
  });
}

export function hostMemoryUnits(): number {
  return Math.floor(os.totalmem() / 1024 ** 3);
}

/**
 * Resolve the process-wide budget at startup. An explicit tier wins, then
 * explicit memory units, then host memory in GiB.
 */
export function resolveResourceBudget(
  opts: { tier: ResourceTier | null; memoryUnits: number | null },
  detectMemoryUnits: () => number = hostMemoryUnits,
): ResourceBudget {
  if (opts.tier) return createResourceBudget(TIER_MEMORY_UNITS[opts.tier]);
  if (opts.memoryUnits !== null) return createResourceBudget(opts.memoryUnits);
  return createResourceBudget(detectMemoryUnits());
}
