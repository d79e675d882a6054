/**
 * Plain-text key numbers for reports, each cost-dependent figure followed by its range.
 */

import type { ModelSummary } from "@/lib/model/summary";
import { HELP_METRICS } from "@/lib/copy/help";
import { formatMillions, formatRange } from "@/lib/utils/format";

export function summaryToLines(summary: ModelSummary): string[] {
  const millions = { prefix: "€", suffix: "M", scale: 1e6 };
  const h = summary.horizonYears;
  const breakEven = summary.breakEvenDegenerate
    ? `${summary.breakEvenYear.base.toFixed(1)} (fallback: maintenance ≥ dialysis cost)`
    : summary.breakEvenYear.base.toFixed(1);

  return [
    `Add'l transplants (Scenario A): ${summary.additionalTransplantsA.toFixed(0)}/year`,
    `Add'l transplants (Scenario B): ${summary.additionalTransplantsB.toFixed(0)}/year`,
    `${HELP_METRICS.breakEvenYear.title}: ${breakEven} (range ${formatRange(summary.breakEvenYear)})`,
    `${HELP_METRICS.currentBurden.title}: ${formatMillions(summary.currentBurden.base, 0)}/year (range ${formatRange(summary.currentBurden, { ...millions, decimals: 0 })})`,
    `Avg annual savings (Scenario B): ${formatMillions(summary.avgAnnualSavingsB.base, 2)} (range ${formatRange(summary.avgAnnualSavingsB, millions)})`,
    `${h}-yr cumulative (Scenario B): ${formatMillions(summary.cumulativeSavingsB.base, 0)} (range ${formatRange(summary.cumulativeSavingsB, { ...millions, decimals: 0 })})`,
    `PIRP annual: ${formatMillions(summary.annualPirpSavings.base)} (range ${formatRange(summary.annualPirpSavings, millions)})`,
    `Pre-emptive annual: ${formatMillions(summary.annualPreemptiveSavingsB, 2)}`,
    `New dialysis cases per year: ${summary.incidentCasesPerYear.toLocaleString("en-US")}`,
    `Cases avoided per year with PIRP: ${summary.avoidedCasesPerYear.toLocaleString("en-US")}`,
    `${HELP_METRICS.horizonTotal.title} (${h} yr): ${formatMillions(summary.horizonSavings.total, 0)}`,
    `BAU dialysis cost (${h} yr): ${formatMillions(summary.dialysisCostProjection.businessAsUsual, 0)}`,
    `With PIRP + transplants (${h} yr): ${formatMillions(summary.dialysisCostProjection.withAllInterventions, 0)}`,
    `3-year per-patient savings: ${formatRange(summary.perPatientSavings, { decimals: 0, prefix: "€", suffix: "k", scale: 1e3 })}`,
  ];
}
