import { describe, it, expect } from "vitest";
import { metricRange, perturbCosts, rangeOf, runSensitivity } from "./sensitivity";
import { COST_SENSITIVITY_DELTAS } from "./constants";
import { defaultRanges, snapshot } from "./params";
import { getBaseSnapshot, getCostEdgeRanges } from "@/fixtures/scenarios";

describe("perturbCosts", () => {
  it("shifts each cost by its delta", () => {
    const ranges = defaultRanges();
    const values = getBaseSnapshot();
    const low = perturbCosts(values, ranges, COST_SENSITIVITY_DELTAS, "LOW");
    const high = perturbCosts(values, ranges, COST_SENSITIVITY_DELTAS, "HIGH");
    expect([low.dialysisAnnualCost, low.transplantYear1Cost, low.transplantMaintenanceCost]).toEqual([
      35_000, 50_000, 9_500,
    ]);
    expect([high.dialysisAnnualCost, high.transplantYear1Cost, high.transplantMaintenanceCost]).toEqual([
      65_000, 70_000, 14_500,
    ]);
  });

  it("leaves non-cost parameters and the input untouched", () => {
    const values = getBaseSnapshot();
    const low = perturbCosts(values, defaultRanges(), COST_SENSITIVITY_DELTAS, "LOW");
    expect(low.populationMillions).toBe(values.populationMillions);
    expect(low.discountRate).toBe(values.discountRate);
    expect(values.dialysisAnnualCost).toBe(50_000);
    expect(Object.isFrozen(low)).toBe(true);
  });

  it("clamps at the top of the ranges", () => {
    const ranges = getCostEdgeRanges();
    const values = snapshot(ranges);
    const high = perturbCosts(values, ranges, COST_SENSITIVITY_DELTAS, "HIGH");
    expect(high.dialysisAnnualCost).toBe(80_000);
    expect(high.transplantYear1Cost).toBe(55_000);
    expect(high.transplantMaintenanceCost).toBe(25_000);
  });

  it("clamps at the bottom of the ranges", () => {
    const ranges = getCostEdgeRanges();
    ranges.dialysisAnnualCost = { ...ranges.dialysisAnnualCost, value: 35_000 };
    const values = snapshot(ranges);
    const low = perturbCosts(values, ranges, COST_SENSITIVITY_DELTAS, "LOW");
    expect(low.dialysisAnnualCost).toBe(30_000);
    expect(low.transplantYear1Cost).toBe(40_000);
    expect(low.transplantMaintenanceCost).toBe(22_500);
  });

  it("never moves dialysis cost outside [30000, 80000]", () => {
    const ranges = defaultRanges();
    for (let cost = 30_000; cost <= 80_000; cost += 5_000) {
      const values = getBaseSnapshot({ dialysisAnnualCost: cost });
      for (const direction of ["LOW", "HIGH"] as const) {
        const perturbed = perturbCosts(values, ranges, COST_SENSITIVITY_DELTAS, direction);
        expect(perturbed.dialysisAnnualCost).toBeGreaterThanOrEqual(30_000);
        expect(perturbed.dialysisAnnualCost).toBeLessThanOrEqual(80_000);
      }
    }
  });
});

describe("runSensitivity", () => {
  it("runs base, low and high passes", () => {
    const values = getBaseSnapshot();
    const analysis = runSensitivity(values, defaultRanges());
    expect(analysis.snapshots.base).toBe(values);
    expect(analysis.base.currentBurden).toBe(325_000_000);
    expect(analysis.low.currentBurden).toBe(227_500_000);
    expect(analysis.high.currentBurden).toBe(422_500_000);
  });

  it("accepts custom deltas", () => {
    const analysis = runSensitivity(getBaseSnapshot(), defaultRanges(), {
      dialysisAnnualCost: 0,
      transplantYear1Cost: 0,
      transplantMaintenanceCost: 0,
    });
    expect(analysis.low).toEqual(analysis.base);
    expect(analysis.high).toEqual(analysis.base);
  });
});

describe("rangeOf / metricRange", () => {
  it("takes min and max over all three values", () => {
    expect(rangeOf(5, 1, 3)).toEqual({ base: 5, min: 1, max: 5 });
    expect(rangeOf(2, 4, 3)).toEqual({ base: 2, min: 2, max: 4 });
  });

  it("ranges a metric across the three runs", () => {
    const analysis = runSensitivity(getBaseSnapshot(), defaultRanges());
    expect(metricRange(analysis, (r) => r.currentBurden)).toEqual({
      base: 325_000_000,
      min: 227_500_000,
      max: 422_500_000,
    });
    expect(metricRange(analysis, (r) => r.breakEvenYear)).toEqual({ base: 2, min: 2, max: 2 });
  });

  it("can range snapshot-derived values", () => {
    const analysis = runSensitivity(getBaseSnapshot(), defaultRanges());
    expect(metricRange(analysis, (_r, v) => v.transplantYear1Cost)).toEqual({
      base: 60_000,
      min: 50_000,
      max: 70_000,
    });
  });

  it("handles base outside the low/high span after clamping", () => {
    // dialysis 10000: both directions clamp to 30000
    const analysis = runSensitivity(
      getBaseSnapshot({ dialysisAnnualCost: 10_000 }),
      defaultRanges()
    );
    expect(analysis.snapshots.low.dialysisAnnualCost).toBe(30_000);
    expect(analysis.snapshots.high.dialysisAnnualCost).toBe(30_000);
    expect(metricRange(analysis, (r) => r.breakEvenYear)).toEqual({ base: 1, min: 1, max: 4 });
  });
});
