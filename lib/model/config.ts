/**
 * Runtime configuration. Sensitivity deltas may be overridden from the environment;
 * unset variables fall back to COST_SENSITIVITY_DELTAS.
 */

import { z } from "zod";
import { CostDeltasSchema, type CostDeltas } from "@/lib/types/zod";
import { COST_SENSITIVITY_DELTAS } from "@/lib/model/constants";

const optionalDelta = z.coerce.number().finite().nonnegative().optional();

const EnvSchema = z.object({
  SENSITIVITY_DELTA_DIALYSIS: optionalDelta,
  SENSITIVITY_DELTA_TX_YEAR1: optionalDelta,
  SENSITIVITY_DELTA_TX_MAINTENANCE: optionalDelta,
});

export interface ModelConfig {
  costDeltas: CostDeltas;
}

/** Drop empty strings so z.coerce does not read them as 0. */
function nonEmpty(env: Record<string, string | undefined>, key: string): string | undefined {
  const v = env[key];
  return v === undefined || v.trim() === "" ? undefined : v;
}

/** Parse model configuration from env. Throws a ZodError naming the offending variable. */
export function loadModelConfig(
  env: Record<string, string | undefined> = process.env
): ModelConfig {
  const parsed = EnvSchema.parse({
    SENSITIVITY_DELTA_DIALYSIS: nonEmpty(env, "SENSITIVITY_DELTA_DIALYSIS"),
    SENSITIVITY_DELTA_TX_YEAR1: nonEmpty(env, "SENSITIVITY_DELTA_TX_YEAR1"),
    SENSITIVITY_DELTA_TX_MAINTENANCE: nonEmpty(env, "SENSITIVITY_DELTA_TX_MAINTENANCE"),
  });
  return {
    costDeltas: CostDeltasSchema.parse({
      dialysisAnnualCost:
        parsed.SENSITIVITY_DELTA_DIALYSIS ?? COST_SENSITIVITY_DELTAS.dialysisAnnualCost,
      transplantYear1Cost:
        parsed.SENSITIVITY_DELTA_TX_YEAR1 ?? COST_SENSITIVITY_DELTAS.transplantYear1Cost,
      transplantMaintenanceCost:
        parsed.SENSITIVITY_DELTA_TX_MAINTENANCE ??
        COST_SENSITIVITY_DELTAS.transplantMaintenanceCost,
    }),
  };
}
