/**
 * Domain constants for the transplant savings model.
 * Plausible bounds for the regional dialysis population; not computed.
 */

import type { CostDeltas } from "@/lib/types/zod";

/** Sensitivity deltas (EUR): dialysis ±15k, transplant year 1 ±10k, transplant year 2+ ±2.5k. */
export const COST_SENSITIVITY_DELTAS: CostDeltas = {
  dialysisAnnualCost: 15_000,
  transplantYear1Cost: 10_000,
  transplantMaintenanceCost: 2_500,
};

/** Home haemodialysis annual cost range (EUR). */
export const HOME_HD_COST_RANGE = [35_000, 45_000] as const;

/** Peritoneal dialysis annual cost range (EUR). */
export const PD_COST_RANGE = [30_000, 40_000] as const;

/** Years used for the per-patient dialysis-vs-transplant comparison. */
export const PER_PATIENT_COMPARISON_YEARS = 3;

/** Currency of every cost parameter. */
export const MODEL_CURRENCY = "EUR";
