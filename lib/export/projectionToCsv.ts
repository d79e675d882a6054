/**
 * Export a result series to CSV.
 * Columns: year, per-source annual savings for A/B, totals, BAU, discounted cumulative series.
 */

import type { ResultSeries } from "@/lib/model/engine";
import type { ValidationResult } from "@/lib/model/validation";

/** Escape a CSV field (wrap in quotes if it contains comma, newline, or quote). */
function escapeCsvField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

const COLUMNS: { header: string; values: (s: ResultSeries) => number[] }[] = [
  { header: "Year", values: (s) => s.years },
  { header: "Transplant expansion (A)", values: (s) => s.txSavingsA },
  { header: "Transplant expansion (B)", values: (s) => s.txSavingsB },
  { header: "PIRP", values: (s) => s.pirpSavings },
  { header: "Pre-emptive (A)", values: (s) => s.preemptiveSavingsA },
  { header: "Pre-emptive (B)", values: (s) => s.preemptiveSavingsB },
  { header: "Total (A)", values: (s) => s.totalSavingsA },
  { header: "Total (B)", values: (s) => s.totalSavingsB },
  { header: "BAU", values: (s) => s.bauSavings },
  { header: "Cumulative total (A)", values: (s) => s.cumulativeTotalA },
  { header: "Cumulative total (B)", values: (s) => s.cumulativeTotalB },
  { header: "Cumulative BAU", values: (s) => s.cumulativeBau },
  { header: "Cumulative transplant expansion (B)", values: (s) => s.cumulativeTxB },
  { header: "Cumulative PIRP", values: (s) => s.cumulativePirp },
];

/**
 * Serialize a result series to CSV string. Raw numbers for spreadsheet compatibility.
 * When validation is given, errors and warnings follow a "--- Validation ---" marker.
 */
export function projectionToCsv(series: ResultSeries, validation?: ValidationResult): string {
  const columns = COLUMNS.map((c) => c.values(series));
  const rows: string[] = [COLUMNS.map((c) => escapeCsvField(c.header)).join(",")];

  series.years.forEach((_, i) => {
    rows.push(columns.map((values) => String(values[i] ?? "")).join(","));
  });

  if (validation && (validation.errors.length || validation.warnings.length)) {
    rows.push("--- Validation ---");
    for (const e of validation.errors) rows.push(`error,${e.code},${escapeCsvField(e.message)}`);
    for (const w of validation.warnings) rows.push(`warning,${w.code},${escapeCsvField(w.message)}`);
  }

  return rows.join("\n");
}
