/**
 * Cost sensitivity: re-run the model with dialysis and transplant costs shifted
 * down (LOW) and up (HIGH) by fixed deltas, clamped to each parameter's range.
 */

import {
  COST_PARAM_KEYS,
  type CostDeltas,
  type ParamKey,
  type ParamRange,
  type Perturbation,
  type ValueSnapshot,
} from "@/lib/types/zod";
import { COST_SENSITIVITY_DELTAS } from "@/lib/model/constants";
import { clampToRange } from "@/lib/model/params";
import { runModel, type ModelRun } from "@/lib/model/engine";

type Bounds = Record<ParamKey, Pick<ParamRange, "min" | "max">>;

/** Copy of the snapshot with each cost parameter moved by its delta and clamped. The input is not mutated. */
export function perturbCosts(
  values: ValueSnapshot,
  ranges: Bounds,
  deltas: CostDeltas,
  direction: Perturbation
): ValueSnapshot {
  const sign = direction === "LOW" ? -1 : 1;
  const next: Record<ParamKey, number> = { ...values };
  for (const key of COST_PARAM_KEYS) {
    next[key] = clampToRange(values[key] + sign * deltas[key], ranges[key]);
  }
  return Object.freeze(next);
}

export interface SensitivityAnalysis {
  snapshots: { base: ValueSnapshot; low: ValueSnapshot; high: ValueSnapshot };
  base: ModelRun;
  low: ModelRun;
  high: ModelRun;
}

/** Run base, cost-low and cost-high passes. The passes share no state. */
export function runSensitivity(
  values: ValueSnapshot,
  ranges: Bounds,
  deltas: CostDeltas = COST_SENSITIVITY_DELTAS
): SensitivityAnalysis {
  const low = perturbCosts(values, ranges, deltas, "LOW");
  const high = perturbCosts(values, ranges, deltas, "HIGH");
  return {
    snapshots: { base: values, low, high },
    base: runModel(values),
    low: runModel(low),
    high: runModel(high),
  };
}

export interface MetricRange {
  base: number;
  min: number;
  max: number;
}

/** Range of three values. Clamping can leave base outside the low/high midpoint, so min/max run over all three. */
export function rangeOf(base: number, low: number, high: number): MetricRange {
  return { base, min: Math.min(base, low, high), max: Math.max(base, low, high) };
}

/** Range of any metric derived from a model run (and optionally its snapshot). */
export function metricRange(
  analysis: SensitivityAnalysis,
  selector: (run: ModelRun, values: ValueSnapshot) => number
): MetricRange {
  return rangeOf(
    selector(analysis.base, analysis.snapshots.base),
    selector(analysis.low, analysis.snapshots.low),
    selector(analysis.high, analysis.snapshots.high)
  );
}
