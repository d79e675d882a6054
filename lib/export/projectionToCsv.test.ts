import { describe, it, expect } from "vitest";
import { projectionToCsv } from "./projectionToCsv";
import { projectScenarios, runModel } from "@/lib/model/engine";
import { getBaseSnapshot } from "@/fixtures/scenarios";

const HEADER =
  "Year,Transplant expansion (A),Transplant expansion (B),PIRP,Pre-emptive (A),Pre-emptive (B),Total (A),Total (B),BAU," +
  "Cumulative total (A),Cumulative total (B),Cumulative BAU,Cumulative transplant expansion (B),Cumulative PIRP";

const smallSeries = projectScenarios({
  horizon: 2,
  addTxA: 1,
  addTxB: 2,
  dialysisAnnualCost: 100,
  tx1Cost: 150,
  txMaintCost: 20,
  populationMillions: 1,
  incidentRatePmp: 10,
  pirpReductionShare: 0.5,
  preemptiveShare: 0.5,
  perCaseDelta: 10,
  discountRate: 0,
});

describe("projectionToCsv", () => {
  it("writes a header and one row per year", () => {
    expect(projectionToCsv(smallSeries).split("\n")).toEqual([
      HEADER,
      "1,-50,-100,500,5,10,455,410,-90,455,410,-90,-100,500",
      "2,30,60,500,5,10,535,570,70,990,980,-20,-40,1000",
    ]);
  });

  it("has horizon + 1 lines for a model run", () => {
    const csv = projectionToCsv(runModel(getBaseSnapshot()).series);
    expect(csv.split("\n")).toHaveLength(11);
  });

  it("appends validation messages, escaping commas", () => {
    const csv = projectionToCsv(smallSeries, {
      errors: [{ code: "OUT_OF_RANGE", message: "a, b" }],
      warnings: [{ code: "SCENARIO_ORDER", message: "Scenario A target is above Scenario B target" }],
    });
    expect(csv.split("\n").slice(3)).toEqual([
      "--- Validation ---",
      'error,OUT_OF_RANGE,"a, b"',
      "warning,SCENARIO_ORDER,Scenario A target is above Scenario B target",
    ]);
  });

  it("omits the validation section when there is nothing to report", () => {
    expect(projectionToCsv(smallSeries, { errors: [], warnings: [] }).split("\n")).toHaveLength(3);
  });
});
