/**
 * Export the inputs, sensitivity snapshots and headline figures as JSON for third-party verification.
 */

import type { CostDeltas, ValueSnapshot } from "@/lib/types/zod";
import type { ResultSeries } from "@/lib/model/engine";
import type { SensitivityAnalysis } from "@/lib/model/sensitivity";
import type { ModelSummary } from "@/lib/model/summary";
import { MODEL_CURRENCY } from "@/lib/model/constants";
import { MODALITY_LABELS, modalityCosts } from "@/lib/model/params";

export interface VerificationExport {
  exportedAt: string;
  currency: string;
  assumptions: ValueSnapshot;
  costDeltas: CostDeltas;
  sensitivitySnapshots: { low: ValueSnapshot; high: ValueSnapshot };
  modalityCosts: { label: string; annualCost: number }[];
  summary: ModelSummary;
  series: ResultSeries;
}

export function buildVerificationExport(
  analysis: SensitivityAnalysis,
  summary: ModelSummary,
  costDeltas: CostDeltas,
  exportedAt: Date
): VerificationExport {
  const costs = modalityCosts(analysis.snapshots.base);
  return {
    exportedAt: exportedAt.toISOString(),
    currency: MODEL_CURRENCY,
    assumptions: analysis.snapshots.base,
    costDeltas,
    sensitivitySnapshots: { low: analysis.snapshots.low, high: analysis.snapshots.high },
    modalityCosts: MODALITY_LABELS.map((label, i) => ({ label, annualCost: costs[i] ?? 0 })),
    summary,
    series: analysis.base.series,
  };
}

/** Pretty-printed JSON and a dated file name for the download. */
export function verificationToJson(payload: VerificationExport): { filename: string; json: string } {
  return {
    filename: `transplant-savings-${payload.exportedAt.slice(0, 10)}.json`,
    json: JSON.stringify(payload, null, 2),
  };
}
