/**
 * Compare two snapshots and produce human-readable changes for a "What changed" panel.
 */

import { PARAM_KEYS, type ParamKey, type ValueSnapshot } from "@/lib/types/zod";
import { HELP_PARAMS } from "@/lib/copy/help";
import { formatCurrency } from "@/lib/utils/format";

export interface ParameterChange {
  key: ParamKey;
  label: string;
  from: string;
  to: string;
}

const CURRENCY_KEYS = new Set<ParamKey>([
  "dialysisAnnualCost",
  "transplantYear1Cost",
  "transplantMaintenanceCost",
  "preemptiveDelta",
]);

const PERCENT_KEYS = new Set<ParamKey>(["pirpReductionShare", "preemptiveShare", "discountRate"]);

export function formatParamValue(key: ParamKey, value: number): string {
  if (CURRENCY_KEYS.has(key)) return formatCurrency(value);
  if (PERCENT_KEYS.has(key)) return `${(value * 100).toFixed(1)}%`;
  switch (key) {
    case "horizonYears":
      return `${value} years`;
    case "populationMillions":
      return `${value}M`;
    case "prevalentDialysisCount":
      return value.toLocaleString("en-US");
    default:
      return `${value} pmp`;
  }
}

/** Diff two snapshots in parameter order. */
export function diffSnapshots(prev: ValueSnapshot, next: ValueSnapshot): ParameterChange[] {
  const changes: ParameterChange[] = [];
  for (const key of PARAM_KEYS) {
    if (prev[key] === next[key]) continue;
    changes.push({
      key,
      label: HELP_PARAMS[key].title,
      from: formatParamValue(key, prev[key]),
      to: formatParamValue(key, next[key]),
    });
  }
  return changes;
}
