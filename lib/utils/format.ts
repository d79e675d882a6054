/**
 * Format currency for display.
 */
import { MODEL_CURRENCY } from "@/lib/model/constants";
import type { MetricRange } from "@/lib/model/sensitivity";

const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: MODEL_CURRENCY,
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return CURRENCY_FORMAT.format(amount);
}

/** €12.3M style. */
export function formatMillions(amount: number, decimals = 1): string {
  return `€${(amount / 1e6).toFixed(decimals)}M`;
}

export interface RangeFormatOptions {
  decimals?: number;
  prefix?: string;
  suffix?: string;
  /** Divide values before formatting (1e6 for millions). */
  scale?: number;
}

/** "low – high" over a sensitivity range. */
export function formatRange(range: MetricRange, options: RangeFormatOptions = {}): string {
  const { decimals = 1, prefix = "", suffix = "", scale = 1 } = options;
  const fmt = (v: number) => `${prefix}${(v / scale).toFixed(decimals)}${suffix}`;
  return `${fmt(range.min)} – ${fmt(range.max)}`;
}
