/**
 * Snapshot fixtures for engine and sensitivity tests.
 * Base values match defaultRanges().
 */

import type { ParameterSet, ValueSnapshot } from "@/lib/types/zod";
import { defaultRanges, snapshot } from "@/lib/model/params";

export function getBaseSnapshot(overrides?: Partial<ValueSnapshot>): ValueSnapshot {
  return { ...snapshot(defaultRanges()), ...overrides };
}

/** Undiscounted base case: cumulative series are plain running sums. */
export function getUndiscountedSnapshot(): ValueSnapshot {
  return getBaseSnapshot({ discountRate: 0 });
}

/** Costs at the edges of their ranges so both sensitivity directions clamp. */
export function getCostEdgeRanges(): ParameterSet {
  const ranges = defaultRanges();
  ranges.dialysisAnnualCost = { ...ranges.dialysisAnnualCost, value: 75_000 };
  ranges.transplantYear1Cost = { ...ranges.transplantYear1Cost, value: 45_000 };
  ranges.transplantMaintenanceCost = { ...ranges.transplantMaintenanceCost, value: 25_000 };
  return ranges;
}

/** Maintenance at or above dialysis cost: break-even falls back to 1. */
export function getDegenerateSnapshot(): ValueSnapshot {
  return getBaseSnapshot({ dialysisAnnualCost: 10_000, transplantMaintenanceCost: 12_000 });
}
