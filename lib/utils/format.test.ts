import { describe, it, expect } from "vitest";
import { formatCurrency, formatMillions, formatRange } from "./format";

describe("format", () => {
  it("formats euros without cents", () => {
    expect(formatCurrency(50_000)).toBe("€50,000");
  });

  it("formats millions", () => {
    expect(formatMillions(25_609_900, 2)).toBe("€25.61M");
    expect(formatMillions(5_800_000)).toBe("€5.8M");
  });

  it("formats a range as min – max", () => {
    expect(formatRange({ base: 2, min: 1, max: 3 })).toBe("1.0 – 3.0");
    expect(
      formatRange({ base: 66_000, min: 36_000, max: 96_000 }, { decimals: 0, prefix: "€", suffix: "k", scale: 1e3 })
    ).toBe("€36k – €96k");
  });
});
