import { describe, it, expect } from "vitest";
import { buildSummary } from "./summary";
import { runSensitivity } from "./sensitivity";
import { defaultRanges } from "./params";
import { getBaseSnapshot, getUndiscountedSnapshot } from "@/fixtures/scenarios";

describe("buildSummary", () => {
  const summary = buildSummary(runSensitivity(getBaseSnapshot(), defaultRanges()));

  it("reports added transplants and break-even", () => {
    expect(summary.horizonYears).toBe(10);
    expect(summary.additionalTransplantsA).toBeCloseTo(62.06, 6);
    expect(summary.additionalTransplantsB).toBeCloseTo(120.06, 6);
    expect(summary.breakEvenYear).toEqual({ base: 2, min: 2, max: 2 });
    expect(summary.breakEvenDegenerate).toBe(false);
  });

  it("ranges the current burden", () => {
    expect(summary.currentBurden).toEqual({ base: 325_000_000, min: 227_500_000, max: 422_500_000 });
  });

  it("counts incident and avoided cases", () => {
    expect(summary.incidentCasesPerYear).toBe(1160);
    expect(summary.avoidedCasesPerYear).toBe(116);
  });

  it("totals savings over the horizon, undiscounted", () => {
    expect(summary.horizonSavings.pirp).toBeCloseTo(58_000_000, 1);
    expect(summary.horizonSavings.transplantExpansion).toBeCloseTo(193_296_600, 1);
    expect(summary.horizonSavings.preemptive).toBeCloseTo(4_802_400, 1);
    expect(summary.horizonSavings.total).toBeCloseTo(256_099_000, 1);
  });

  it("projects dialysis cost with and without interventions", () => {
    expect(summary.dialysisCostProjection.businessAsUsual).toBe(3_250_000_000);
    expect(summary.dialysisCostProjection.withPirp).toBeCloseTo(3_192_000_000, 1);
    expect(summary.dialysisCostProjection.withAllInterventions).toBeCloseTo(2_993_901_000, 1);
  });

  it("ranges the 3-year per-patient saving", () => {
    // base 150000 − 84000, low 105000 − 69000, high 195000 − 99000
    expect(summary.perPatientSavings).toEqual({ base: 66_000, min: 36_000, max: 96_000 });
  });

  it("cumulative B uses the discounted series", () => {
    expect(summary.cumulativeSavingsB.base).toBeLessThan(summary.horizonSavings.total);
    const undiscounted = buildSummary(runSensitivity(getUndiscountedSnapshot(), defaultRanges()));
    expect(undiscounted.cumulativeSavingsB.base).toBeCloseTo(undiscounted.horizonSavings.total, 1);
  });

  it("keeps base within every range", () => {
    for (const r of [summary.avgAnnualSavingsB, summary.cumulativeSavingsB, summary.annualPirpSavings]) {
      expect(r.min).toBeLessThanOrEqual(r.base);
      expect(r.max).toBeGreaterThanOrEqual(r.base);
    }
  });

  it("flags the degenerate break-even fallback", () => {
    const degenerate = buildSummary(
      runSensitivity(getBaseSnapshot({ dialysisAnnualCost: 10_000 }), defaultRanges())
    );
    expect(degenerate.breakEvenDegenerate).toBe(true);
    expect(degenerate.breakEvenYear.base).toBe(1);
  });
});
