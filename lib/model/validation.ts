/**
 * Guardrails for a snapshot before an engine run.
 * The engine trusts its inputs; this is where out-of-range values are caught.
 */

import { PARAM_KEYS, type ParameterSet, type ValueSnapshot } from "@/lib/types/zod";
import { isBreakEvenDegenerate } from "./engine";

export interface ValidationError {
  code: "OUT_OF_RANGE" | "INVALID_HORIZON" | "NON_FINITE";
  message: string;
}

export interface ValidationWarning {
  code: "DEGENERATE_BREAK_EVEN" | "TARGET_BELOW_BASELINE" | "SCENARIO_ORDER";
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Validate a snapshot against the parameter bounds.
 * Hard errors block calculation; soft warnings allow it.
 */
export function validateSnapshot(values: ValueSnapshot, ranges: ParameterSet): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  for (const key of PARAM_KEYS) {
    const value = values[key];
    const { min, max } = ranges[key];
    if (!Number.isFinite(value)) {
      errors.push({ code: "NON_FINITE", message: `${key} must be a finite number (got ${value})` });
    } else if (value < min || value > max) {
      errors.push({
        code: "OUT_OF_RANGE",
        message: `${key} must be between ${min} and ${max} (got ${value})`,
      });
    }
  }

  if (!Number.isInteger(values.horizonYears) || values.horizonYears < 1) {
    errors.push({
      code: "INVALID_HORIZON",
      message: `Horizon must be a whole number of years, at least 1 (got ${values.horizonYears})`,
    });
  }

  if (isBreakEvenDegenerate(values.dialysisAnnualCost, values.transplantMaintenanceCost)) {
    warnings.push({
      code: "DEGENERATE_BREAK_EVEN",
      message:
        "Transplant maintenance costs at least as much as dialysis; break-even year falls back to 1",
    });
  }

  for (const [label, target] of [
    ["Scenario A", values.scenarioATxRatePmp],
    ["Scenario B", values.scenarioBTxRatePmp],
  ] as const) {
    if (target < values.baselineTxRatePmp) {
      warnings.push({
        code: "TARGET_BELOW_BASELINE",
        message: `${label} target (${target} pmp) is below baseline (${values.baselineTxRatePmp} pmp); adds no transplants`,
      });
    }
  }

  if (values.scenarioATxRatePmp > values.scenarioBTxRatePmp) {
    warnings.push({
      code: "SCENARIO_ORDER",
      message: "Scenario A target is above Scenario B target",
    });
  }

  return { errors, warnings };
}
