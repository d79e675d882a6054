import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadModelConfig } from "./config";

describe("loadModelConfig", () => {
  it("uses the default deltas when nothing is set", () => {
    expect(loadModelConfig({})).toEqual({
      costDeltas: {
        dialysisAnnualCost: 15_000,
        transplantYear1Cost: 10_000,
        transplantMaintenanceCost: 2_500,
      },
    });
  });

  it("reads overrides from env", () => {
    const config = loadModelConfig({
      SENSITIVITY_DELTA_DIALYSIS: "20000",
      SENSITIVITY_DELTA_TX_MAINTENANCE: "1000",
    });
    expect(config.costDeltas).toEqual({
      dialysisAnnualCost: 20_000,
      transplantYear1Cost: 10_000,
      transplantMaintenanceCost: 1_000,
    });
  });

  it("treats blank variables as unset", () => {
    expect(loadModelConfig({ SENSITIVITY_DELTA_TX_YEAR1: "  " }).costDeltas.transplantYear1Cost).toBe(10_000);
  });

  it("rejects negative or non-numeric values", () => {
    expect(() => loadModelConfig({ SENSITIVITY_DELTA_DIALYSIS: "-5" })).toThrow(ZodError);
    expect(() => loadModelConfig({ SENSITIVITY_DELTA_TX_YEAR1: "abc" })).toThrow(ZodError);
  });
});
