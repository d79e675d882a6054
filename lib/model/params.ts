/**
 * Parameter ranges for the input surface and snapshot extraction for the engine.
 */

import {
  PARAM_KEYS,
  type ParamKey,
  type ParamRange,
  type ParameterSet,
  type ValueSnapshot,
} from "@/lib/types/zod";
import { HOME_HD_COST_RANGE, PD_COST_RANGE } from "@/lib/model/constants";
import { MissingParameterError } from "@/lib/model/errors";

function range(min: number, max: number, value: number): ParamRange {
  return { min, max, value };
}

/** Fresh parameter set with the default bounds and base values. Slider ranges are wider than the published table to allow exploration. */
export function defaultRanges(): ParameterSet {
  return {
    populationMillions: range(2.0, 12.0, 5.8),
    baselineTxRatePmp: range(5.0, 30.0, 14.3),
    prevalentDialysisCount: range(2_000, 15_000, 6_500),
    scenarioATxRatePmp: range(15.0, 50.0, 25.0),
    scenarioBTxRatePmp: range(20.0, 60.0, 35.0),
    horizonYears: range(3, 20, 10),
    dialysisAnnualCost: range(30_000, 80_000, 50_000),
    transplantYear1Cost: range(40_000, 100_000, 60_000),
    transplantMaintenanceCost: range(5_000, 25_000, 12_000),
    incidentEskdRatePmp: range(80, 350, 200),
    pirpReductionShare: range(0.0, 0.3, 0.1),
    preemptiveShare: range(0.0, 0.5, 0.2),
    preemptiveDelta: range(5_000, 50_000, 20_000),
    discountRate: range(0.0, 0.1, 0.03),
  };
}

export function clampToRange(value: number, r: Pick<ParamRange, "min" | "max">): number {
  return Math.max(r.min, Math.min(r.max, value));
}

/**
 * Read the current value of every parameter into a frozen snapshot.
 * No clamping; out-of-range values pass through unchanged.
 */
export function snapshot(ranges: Partial<Record<ParamKey, ParamRange>>): ValueSnapshot {
  const values: Partial<Record<ParamKey, number>> = {};
  for (const key of PARAM_KEYS) {
    const r = ranges[key];
    if (r !== undefined) values[key] = r.value;
  }
  return Object.freeze(requireComplete(values));
}

/** Narrow a partial value record to a full snapshot, naming the first missing key. */
export function requireComplete(values: Partial<Record<ParamKey, number>>): ValueSnapshot {
  const get = (key: ParamKey): number => {
    const v = values[key];
    if (v === undefined) throw new MissingParameterError(key);
    return v;
  };
  return {
    populationMillions: get("populationMillions"),
    baselineTxRatePmp: get("baselineTxRatePmp"),
    prevalentDialysisCount: get("prevalentDialysisCount"),
    scenarioATxRatePmp: get("scenarioATxRatePmp"),
    scenarioBTxRatePmp: get("scenarioBTxRatePmp"),
    horizonYears: get("horizonYears"),
    dialysisAnnualCost: get("dialysisAnnualCost"),
    transplantYear1Cost: get("transplantYear1Cost"),
    transplantMaintenanceCost: get("transplantMaintenanceCost"),
    incidentEskdRatePmp: get("incidentEskdRatePmp"),
    pirpReductionShare: get("pirpReductionShare"),
    preemptiveShare: get("preemptiveShare"),
    preemptiveDelta: get("preemptiveDelta"),
    discountRate: get("discountRate"),
  };
}

export const MODALITY_LABELS = [
  "In-centre haemodialysis",
  "Home haemodialysis",
  "Peritoneal dialysis",
  "Kidney transplant (Year 1)",
  "Kidney transplant (Year 2+)",
] as const;

function midpoint([low, high]: readonly [number, number]): number {
  return (low + high) / 2;
}

/** Annual cost per renal replacement modality, in MODALITY_LABELS order. Home HD and PD are literature midpoints. */
export function modalityCosts(values: ValueSnapshot): number[] {
  return [
    values.dialysisAnnualCost,
    midpoint(HOME_HD_COST_RANGE),
    midpoint(PD_COST_RANGE),
    values.transplantYear1Cost,
    values.transplantMaintenanceCost,
  ];
}
