/**
 * Centralized labels and help content for parameters and headline metrics.
 * Format: { title, description, example? }
 */

import type { ParamKey } from "@/lib/types/zod";

export type HelpEntry = {
  title: string;
  description: string;
  example?: string;
};

/** Format HelpEntry for tooltip content (description + optional example). */
export function formatHelpEntry(entry: HelpEntry): string {
  return entry.example
    ? `${entry.description} Example: ${entry.example}.`
    : entry.description;
}

export type ParamGroup = "Demography" | "Scenarios" | "Costs (EUR)" | "PIRP & incidence" | "Pre-emptive" | "Discount rate";

/** Input-surface grouping and slider step per parameter. */
export const PARAM_CONTROLS: Record<ParamKey, { group: ParamGroup; step: number }> = {
  populationMillions: { group: "Demography", step: 0.1 },
  baselineTxRatePmp: { group: "Demography", step: 0.5 },
  prevalentDialysisCount: { group: "Demography", step: 100 },
  scenarioATxRatePmp: { group: "Scenarios", step: 1 },
  scenarioBTxRatePmp: { group: "Scenarios", step: 1 },
  horizonYears: { group: "Scenarios", step: 1 },
  dialysisAnnualCost: { group: "Costs (EUR)", step: 1_000 },
  transplantYear1Cost: { group: "Costs (EUR)", step: 1_000 },
  transplantMaintenanceCost: { group: "Costs (EUR)", step: 500 },
  incidentEskdRatePmp: { group: "PIRP & incidence", step: 10 },
  pirpReductionShare: { group: "PIRP & incidence", step: 0.01 },
  preemptiveShare: { group: "Pre-emptive", step: 0.05 },
  preemptiveDelta: { group: "Pre-emptive", step: 1_000 },
  discountRate: { group: "Discount rate", step: 0.01 },
};

export const HELP_PARAMS: Record<ParamKey, HelpEntry> = {
  populationMillions: {
    title: "Population (millions)",
    description: "Resident population of the region. Scales transplant and incidence counts, which are per million population.",
  },
  baselineTxRatePmp: {
    title: "Baseline transplant rate (pmp)",
    description: "Kidney transplants per million population per year today.",
  },
  prevalentDialysisCount: {
    title: "Prevalent dialysis N",
    description: "Patients currently on dialysis. Drives the current annual dialysis burden.",
  },
  scenarioATxRatePmp: {
    title: "Scenario A target (pmp)",
    description: "Transplant rate reached under the moderate expansion scenario.",
  },
  scenarioBTxRatePmp: {
    title: "Scenario B target (pmp)",
    description: "Transplant rate reached under the ambitious expansion scenario.",
  },
  horizonYears: {
    title: "Time horizon (years)",
    description: "Number of years projected.",
  },
  dialysisAnnualCost: {
    title: "Annual dialysis cost",
    description: "Cost of one patient-year of in-centre haemodialysis.",
  },
  transplantYear1Cost: {
    title: "Transplant year 1 cost",
    description: "Surgery, hospital stay and first-year follow-up and immunosuppression for one recipient.",
  },
  transplantMaintenanceCost: {
    title: "Transplant year 2+ cost",
    description: "Annual follow-up and immunosuppression cost from the second year after transplant.",
  },
  incidentEskdRatePmp: {
    title: "Incident ESKD (pmp/year)",
    description: "New end-stage kidney disease cases per million population per year.",
  },
  pirpReductionShare: {
    title: "PIRP incidence reduction (share)",
    description: "Share of incident ESKD cases avoided by integrated chronic kidney disease care.",
    example: "0.10 avoids one in ten new dialysis starts",
  },
  preemptiveShare: {
    title: "Pre-emptive share (of add'l transplants)",
    description: "Share of additional transplants performed before the patient starts dialysis.",
  },
  preemptiveDelta: {
    title: "Incremental saving per pre-emptive tx (EUR)",
    description: "Extra saving from each pre-emptive transplant compared with one after dialysis.",
  },
  discountRate: {
    title: "Discount rate",
    description: "Annual rate converting future savings to present value in the cumulative series.",
    example: "0.03 is a common public-sector rate",
  },
};

/** Headline metric help */
export const HELP_METRICS = {
  breakEvenYear: {
    title: "Break-even year",
    description: "First year at which cumulative transplant cost per patient no longer exceeds cumulative dialysis cost.",
  },
  currentBurden: {
    title: "Current dialysis burden",
    description: "Prevalent dialysis patients × annual dialysis cost.",
  },
  horizonTotal: {
    title: "Total savings over horizon",
    description: "PIRP + transplant expansion + pre-emptive for Scenario B, undiscounted.",
  },
} satisfies Record<string, HelpEntry>;
