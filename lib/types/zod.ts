/**
 * Zod schemas for the transplant savings model.
 * Parameter ranges, the 14-key parameter set, and the value snapshot fed to the engine.
 */

import { z } from "zod";

/** One shape per parameter, in input-surface order (demography, scenarios, costs, PIRP, pre-emptive, discount). */
function parameterShape<T extends z.ZodTypeAny>(schema: T) {
  return {
    populationMillions: schema,
    baselineTxRatePmp: schema,
    prevalentDialysisCount: schema,
    scenarioATxRatePmp: schema,
    scenarioBTxRatePmp: schema,
    horizonYears: schema,
    dialysisAnnualCost: schema,
    transplantYear1Cost: schema,
    transplantMaintenanceCost: schema,
    incidentEskdRatePmp: schema,
    pirpReductionShare: schema,
    preemptiveShare: schema,
    preemptiveDelta: schema,
    discountRate: schema,
  };
}

export const ParamRangeSchema = z
  .object({
    /** Inclusive lower bound, same unit as value. */
    min: z.number(),
    /** Inclusive upper bound. */
    max: z.number(),
    value: z.number(),
  })
  .refine((r) => r.min <= r.max, { message: "min must not exceed max" });
export type ParamRange = z.infer<typeof ParamRangeSchema>;

/** Flat key → value record used for exactly one engine run. Never mutated after extraction. */
export const ValueSnapshotSchema = z.object(parameterShape(z.number())).strict();
export type ValueSnapshot = Readonly<z.infer<typeof ValueSnapshotSchema>>;

export const ParameterSetSchema = z.object(parameterShape(ParamRangeSchema)).strict();
export type ParameterSet = z.infer<typeof ParameterSetSchema>;

export const ParamKeySchema = ValueSnapshotSchema.keyof();
export type ParamKey = z.infer<typeof ParamKeySchema>;

/** Fixed, complete key set. Every engine run needs all of them. */
export const PARAM_KEYS = ParamKeySchema.options;

/** Cost parameters perturbed by the sensitivity analysis. */
export const COST_PARAM_KEYS = [
  "dialysisAnnualCost",
  "transplantYear1Cost",
  "transplantMaintenanceCost",
] as const satisfies readonly ParamKey[];
export type CostParamKey = (typeof COST_PARAM_KEYS)[number];

export const PerturbationSchema = z.enum(["LOW", "HIGH"]);
export type Perturbation = z.infer<typeof PerturbationSchema>;

/** Absolute deltas applied to each cost parameter (EUR). */
export const CostDeltasSchema = z.object({
  dialysisAnnualCost: z.number().nonnegative(),
  transplantYear1Cost: z.number().nonnegative(),
  transplantMaintenanceCost: z.number().nonnegative(),
});
export type CostDeltas = z.infer<typeof CostDeltasSchema>;
