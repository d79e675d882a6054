/**
 * Transplant savings calculation engine.
 * Annual flow model: transplant expansion, PIRP incidence reduction, pre-emptive add-on.
 * Pure functions; callers supply in-range values.
 */

import type { ValueSnapshot } from "@/lib/types/zod";
import { assertHorizon } from "@/lib/model/errors";

/** Additional transplants per year: (target − baseline) × population (millions). Never negative. */
export function additionalTransplants(
  targetRatePmp: number,
  baselineRatePmp: number,
  populationMillions: number
): number {
  return Math.max(0, (targetRatePmp - baselineRatePmp) * populationMillions);
}

export interface PatientCostSeries {
  /** Cumulative dialysis cost per patient, years 1..N. */
  dialysis: number[];
  /** Cumulative transplant cost per patient, years 1..N. */
  transplant: number[];
  /** transplant − dialysis; negative means transplant is cheaper to date. */
  difference: number[];
}

/** Per-patient cumulative dialysis vs transplant cost for years 1..years. */
export function cumulativePatientCosts(
  years: number,
  dialysisAnnualCost: number,
  tx1Cost: number,
  txMaintCost: number
): PatientCostSeries {
  assertHorizon(years);
  const dialysis: number[] = [];
  const transplant: number[] = [];
  const difference: number[] = [];
  for (let t = 1; t <= years; t++) {
    const d = t * dialysisAnnualCost;
    const tx = tx1Cost + (t - 1) * txMaintCost;
    dialysis.push(d);
    transplant.push(tx);
    difference.push(tx - d);
  }
  return { dialysis, transplant, difference };
}

/** True when maintenance costs at least as much as dialysis, so breakEvenYear falls back to 1. */
export function isBreakEvenDegenerate(dialysisAnnualCost: number, txMaintCost: number): boolean {
  return dialysisAnnualCost - txMaintCost <= 0;
}

/**
 * First year (1-based) at which cumulative transplant cost no longer exceeds cumulative dialysis cost.
 * Solves t × dialysis = tx1 + (t − 1) × maint, rounded up, floored at 1.
 *
 * Approximation: when dialysis ≤ maintenance the denominator is non-positive and 1 is returned.
 * That value is not a real break-even year; check isBreakEvenDegenerate when it matters.
 */
export function breakEvenYear(
  dialysisAnnualCost: number,
  tx1Cost: number,
  txMaintCost: number
): number {
  if (isBreakEvenDegenerate(dialysisAnnualCost, txMaintCost)) return 1;
  const t = (tx1Cost - txMaintCost) / (dialysisAnnualCost - txMaintCost);
  return Math.max(1, Math.ceil(t));
}

/**
 * S_TX(t) = AddTx × [(C_dial − C_tx1) + (t − 1)(C_dial − C_txMaint)].
 * Grows each year as earlier cohorts keep accruing the dialysis-vs-maintenance differential.
 */
export function savingsFromTransplantExpansion(
  year: number,
  addTx: number,
  dialysisAnnualCost: number,
  tx1Cost: number,
  txMaintCost: number
): number {
  return (
    addTx *
    (dialysisAnnualCost - tx1Cost + (year - 1) * (dialysisAnnualCost - txMaintCost))
  );
}

/** Annual dialysis cost avoided by PIRP: population × incident rate × reduction share × dialysis cost. */
export function savingsFromIncidenceReduction(
  populationMillions: number,
  incidentRatePmp: number,
  pirpReductionShare: number,
  dialysisAnnualCost: number
): number {
  const avoidedCases = populationMillions * incidentRatePmp * pirpReductionShare;
  return avoidedCases * dialysisAnnualCost;
}

/** Annual pre-emptive add-on: AddTx × pre-emptive share × per-case saving. Constant each year. */
export function savingsFromPreemptiveTransplant(
  addTx: number,
  preemptiveShare: number,
  perCaseDelta: number
): number {
  return addTx * preemptiveShare * perCaseDelta;
}

/** Current annual dialysis expenditure (EUR). */
export function currentAnnualBurden(prevalentDialysisCount: number, dialysisAnnualCost: number): number {
  return prevalentDialysisCount * dialysisAnnualCost;
}

/**
 * Running total of an annual series. With rate > 0 each year t is weighted by 1/(1+rate)^t
 * (end-of-year discounting, annual compounding).
 */
export function discountedCumulative(series: readonly number[], rate: number): number[] {
  const out: number[] = [];
  let acc = 0;
  series.forEach((value, i) => {
    const factor = rate <= 0 ? 1 : 1 / Math.pow(1 + rate, i + 1);
    acc += value * factor;
    out.push(acc);
  });
  return out;
}

function sum(series: readonly number[]): number {
  return series.reduce((a, b) => a + b, 0);
}

export interface ProjectionInput {
  horizon: number;
  addTxA: number;
  addTxB: number;
  dialysisAnnualCost: number;
  tx1Cost: number;
  txMaintCost: number;
  populationMillions: number;
  incidentRatePmp: number;
  pirpReductionShare: number;
  preemptiveShare: number;
  perCaseDelta: number;
  discountRate: number;
}

export interface ResultSeries {
  /** 1..horizon */
  years: number[];
  txSavingsA: number[];
  txSavingsB: number[];
  pirpSavings: number[];
  preemptiveSavingsA: number[];
  preemptiveSavingsB: number[];
  totalSavingsA: number[];
  totalSavingsB: number[];
  /** Business-as-usual: scenario B transplant + pre-emptive, no PIRP credit. */
  bauSavings: number[];
  cumulativeTotalA: number[];
  cumulativeTotalB: number[];
  cumulativeBau: number[];
  cumulativeTxB: number[];
  cumulativePirp: number[];
  avgAnnualA: number;
  avgAnnualB: number;
  avgTxSavingsB: number;
  annualPirpSavings: number;
  annualPreemptiveSavingsB: number;
}

/** Year-by-year savings for scenarios A and B plus BAU, with discounted cumulative series. */
export function projectScenarios(input: ProjectionInput): ResultSeries {
  const { horizon, addTxA, addTxB, dialysisAnnualCost, tx1Cost, txMaintCost, discountRate } = input;
  assertHorizon(horizon);

  const years = Array.from({ length: horizon }, (_, i) => i + 1);
  const txFor = (addTx: number) =>
    years.map((t) => savingsFromTransplantExpansion(t, addTx, dialysisAnnualCost, tx1Cost, txMaintCost));

  const annualPirpSavings = savingsFromIncidenceReduction(
    input.populationMillions,
    input.incidentRatePmp,
    input.pirpReductionShare,
    dialysisAnnualCost
  );
  const preA = savingsFromPreemptiveTransplant(addTxA, input.preemptiveShare, input.perCaseDelta);
  const preB = savingsFromPreemptiveTransplant(addTxB, input.preemptiveShare, input.perCaseDelta);

  const txSavingsA = txFor(addTxA);
  const txSavingsB = txFor(addTxB);
  const pirpSavings = years.map(() => annualPirpSavings);
  const preemptiveSavingsA = years.map(() => preA);
  const preemptiveSavingsB = years.map(() => preB);

  const totalSavingsA = txSavingsA.map((tx) => tx + annualPirpSavings + preA);
  const totalSavingsB = txSavingsB.map((tx) => tx + annualPirpSavings + preB);
  const bauSavings = txSavingsB.map((tx) => tx + preB);

  return {
    years,
    txSavingsA,
    txSavingsB,
    pirpSavings,
    preemptiveSavingsA,
    preemptiveSavingsB,
    totalSavingsA,
    totalSavingsB,
    bauSavings,
    cumulativeTotalA: discountedCumulative(totalSavingsA, discountRate),
    cumulativeTotalB: discountedCumulative(totalSavingsB, discountRate),
    cumulativeBau: discountedCumulative(bauSavings, discountRate),
    cumulativeTxB: discountedCumulative(txSavingsB, discountRate),
    cumulativePirp: discountedCumulative(pirpSavings, discountRate),
    avgAnnualA: sum(totalSavingsA) / horizon,
    avgAnnualB: sum(totalSavingsB) / horizon,
    avgTxSavingsB: sum(txSavingsB) / horizon,
    annualPirpSavings,
    annualPreemptiveSavingsB: preB,
  };
}

/** Everything one snapshot yields: added transplants, break-even, burden, and the projection. */
export interface ModelRun {
  additionalTransplantsA: number;
  additionalTransplantsB: number;
  breakEvenYear: number;
  currentBurden: number;
  series: ResultSeries;
}

/** Evaluate a full snapshot. The horizon is truncated to whole years, as the input surface steps it. */
export function runModel(values: ValueSnapshot): ModelRun {
  const addTxA = additionalTransplants(
    values.scenarioATxRatePmp,
    values.baselineTxRatePmp,
    values.populationMillions
  );
  const addTxB = additionalTransplants(
    values.scenarioBTxRatePmp,
    values.baselineTxRatePmp,
    values.populationMillions
  );

  const series = projectScenarios({
    horizon: Math.trunc(values.horizonYears),
    addTxA,
    addTxB,
    dialysisAnnualCost: values.dialysisAnnualCost,
    tx1Cost: values.transplantYear1Cost,
    txMaintCost: values.transplantMaintenanceCost,
    populationMillions: values.populationMillions,
    incidentRatePmp: values.incidentEskdRatePmp,
    pirpReductionShare: values.pirpReductionShare,
    preemptiveShare: values.preemptiveShare,
    perCaseDelta: values.preemptiveDelta,
    discountRate: values.discountRate,
  });

  return {
    additionalTransplantsA: addTxA,
    additionalTransplantsB: addTxB,
    breakEvenYear: breakEvenYear(
      values.dialysisAnnualCost,
      values.transplantYear1Cost,
      values.transplantMaintenanceCost
    ),
    currentBurden: currentAnnualBurden(values.prevalentDialysisCount, values.dialysisAnnualCost),
    series,
  };
}
