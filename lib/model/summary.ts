/**
 * Headline figures for the reporting surface, with cost-sensitivity ranges.
 * Horizon totals are undiscounted; only the cumulative series carry discounting.
 */

import type { ValueSnapshot } from "@/lib/types/zod";
import { PER_PATIENT_COMPARISON_YEARS } from "@/lib/model/constants";
import { cumulativePatientCosts, isBreakEvenDegenerate, type ModelRun } from "@/lib/model/engine";
import { metricRange, type MetricRange, type SensitivityAnalysis } from "@/lib/model/sensitivity";

export interface HorizonSavings {
  pirp: number;
  transplantExpansion: number;
  preemptive: number;
  total: number;
}

export interface DialysisCostProjection {
  /** horizon × current burden */
  businessAsUsual: number;
  withPirp: number;
  withAllInterventions: number;
}

export interface ModelSummary {
  horizonYears: number;
  additionalTransplantsA: number;
  additionalTransplantsB: number;
  breakEvenYear: MetricRange;
  /** True when the break-even figure is the fallback value, not a solved year. */
  breakEvenDegenerate: boolean;
  currentBurden: MetricRange;
  avgAnnualSavingsB: MetricRange;
  /** Discounted cumulative scenario B savings at the final year. */
  cumulativeSavingsB: MetricRange;
  annualPirpSavings: MetricRange;
  annualPreemptiveSavingsB: number;
  incidentCasesPerYear: number;
  avoidedCasesPerYear: number;
  horizonSavings: HorizonSavings;
  dialysisCostProjection: DialysisCostProjection;
  /** Per-patient dialysis minus transplant cost over the comparison window. */
  perPatientSavings: MetricRange;
}

function sum(series: readonly number[]): number {
  return series.reduce((a, b) => a + b, 0);
}

function last(series: readonly number[]): number {
  return series[series.length - 1] ?? 0;
}

function perPatientSaving(values: ValueSnapshot): number {
  const costs = cumulativePatientCosts(
    PER_PATIENT_COMPARISON_YEARS,
    values.dialysisAnnualCost,
    values.transplantYear1Cost,
    values.transplantMaintenanceCost
  );
  return -last(costs.difference);
}

export function buildSummary(analysis: SensitivityAnalysis): ModelSummary {
  const values = analysis.snapshots.base;
  const run: ModelRun = analysis.base;
  const { series } = run;
  const horizonYears = series.years.length;

  const horizonSavings: HorizonSavings = {
    pirp: horizonYears * series.annualPirpSavings,
    transplantExpansion: sum(series.txSavingsB),
    preemptive: horizonYears * series.annualPreemptiveSavingsB,
    total: sum(series.totalSavingsB),
  };
  const businessAsUsual = horizonYears * run.currentBurden;

  return {
    horizonYears,
    additionalTransplantsA: run.additionalTransplantsA,
    additionalTransplantsB: run.additionalTransplantsB,
    breakEvenYear: metricRange(analysis, (r) => r.breakEvenYear),
    breakEvenDegenerate: isBreakEvenDegenerate(
      values.dialysisAnnualCost,
      values.transplantMaintenanceCost
    ),
    currentBurden: metricRange(analysis, (r) => r.currentBurden),
    avgAnnualSavingsB: metricRange(analysis, (r) => r.series.avgAnnualB),
    cumulativeSavingsB: metricRange(analysis, (r) => last(r.series.cumulativeTotalB)),
    annualPirpSavings: metricRange(analysis, (r) => r.series.annualPirpSavings),
    annualPreemptiveSavingsB: series.annualPreemptiveSavingsB,
    incidentCasesPerYear: Math.round(values.populationMillions * values.incidentEskdRatePmp),
    avoidedCasesPerYear: Math.round(
      values.populationMillions * values.incidentEskdRatePmp * values.pirpReductionShare
    ),
    horizonSavings,
    dialysisCostProjection: {
      businessAsUsual,
      withPirp: businessAsUsual - horizonSavings.pirp,
      withAllInterventions: businessAsUsual - horizonSavings.total,
    },
    perPatientSavings: metricRange(analysis, (_r, v) => perPatientSaving(v)),
  };
}
