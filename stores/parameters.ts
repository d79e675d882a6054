/**
 * Zustand store for one session's parameter set and the computed model.
 * The only mutable state in the project; the engine only ever sees frozen snapshots.
 */

import { createStore } from "zustand/vanilla";
import {
  ParamKeySchema,
  ParameterSetSchema,
  type CostDeltas,
  type ParamKey,
  type ParameterSet,
  type ValueSnapshot,
} from "@/lib/types/zod";
import { clampToRange, defaultRanges, snapshot } from "@/lib/model/params";
import { COST_SENSITIVITY_DELTAS } from "@/lib/model/constants";
import { runSensitivity, type SensitivityAnalysis } from "@/lib/model/sensitivity";
import { buildSummary, type ModelSummary } from "@/lib/model/summary";
import { validateSnapshot, type ValidationResult } from "@/lib/model/validation";

// --- Store state ---

export interface ParameterState {
  ranges: ParameterSet;
  costDeltas: CostDeltas;
  snapshot: ValueSnapshot;
  validation: ValidationResult;
  /** Null while validation has hard errors. */
  sensitivity: SensitivityAnalysis | null;
  summary: ModelSummary | null;
  /** Snapshot before the last change; used for the What Changed panel. */
  previousSnapshot: ValueSnapshot | null;
}

export interface ParameterActions {
  /** Set one value, clamped into its range. Horizon is rounded to whole years. */
  setValue: (key: ParamKey, value: number) => void;
  setValues: (patch: Partial<Record<ParamKey, number>>) => void;
  reset: () => void;
  clearComparison: () => void;
  recompute: () => void;
}

export type ParameterStore = ParameterState & ParameterActions;

export interface ParameterStoreOptions {
  ranges?: ParameterSet;
  costDeltas?: CostDeltas;
}

function compute(
  ranges: ParameterSet,
  costDeltas: CostDeltas
): Pick<ParameterState, "snapshot" | "validation" | "sensitivity" | "summary"> {
  const values = snapshot(ranges);
  const validation = validateSnapshot(values, ranges);
  if (validation.errors.length > 0) {
    console.error(
      "[Parameters] Not computing model:",
      validation.errors.map((e) => e.message).join("; ")
    );
    return { snapshot: values, validation, sensitivity: null, summary: null };
  }
  const sensitivity = runSensitivity(values, ranges, costDeltas);
  return { snapshot: values, validation, sensitivity, summary: buildSummary(sensitivity) };
}

/** Resolve an incoming value against its range. Returns null for non-finite input. */
function resolveValue(ranges: ParameterSet, key: ParamKey, value: number): number | null {
  if (!Number.isFinite(value)) {
    console.warn(`[Parameters] Ignoring non-finite value for ${key}:`, value);
    return null;
  }
  const stepped = key === "horizonYears" ? Math.round(value) : value;
  const clamped = clampToRange(stepped, ranges[key]);
  if (clamped !== stepped) {
    console.warn(`[Parameters] ${key}=${value} outside [${ranges[key].min}, ${ranges[key].max}]; clamped to ${clamped}`);
  }
  return clamped;
}

/** One independent store per session. */
export function createParameterStore(options: ParameterStoreOptions = {}) {
  const initialRanges = ParameterSetSchema.parse(options.ranges ?? defaultRanges());
  const costDeltas = options.costDeltas ?? COST_SENSITIVITY_DELTAS;

  return createStore<ParameterStore>()((set, get) => ({
    ranges: initialRanges,
    costDeltas,
    ...compute(initialRanges, costDeltas),
    previousSnapshot: null,

    setValue: (key, value) => {
      const patch: Partial<Record<ParamKey, number>> = {};
      patch[key] = value;
      get().setValues(patch);
    },

    setValues: (patch) => {
      const { ranges, snapshot: current } = get();
      const next: ParameterSet = { ...ranges };
      let changed = false;
      for (const [key, value] of Object.entries(patch)) {
        const parsedKey = ParamKeySchema.safeParse(key);
        if (!parsedKey.success) {
          console.warn(`[Parameters] Ignoring unknown parameter: ${key}`);
          continue;
        }
        if (value === undefined) continue;
        const resolved = resolveValue(ranges, parsedKey.data, value);
        if (resolved === null || resolved === ranges[parsedKey.data].value) continue;
        next[parsedKey.data] = { ...ranges[parsedKey.data], value: resolved };
        changed = true;
      }
      if (!changed) return;
      set({ ranges: next, previousSnapshot: current });
      get().recompute();
    },

    reset: () => {
      set({ ranges: initialRanges, previousSnapshot: get().snapshot });
      get().recompute();
    },

    clearComparison: () => {
      set({ previousSnapshot: null });
    },

    recompute: () => {
      const { ranges } = get();
      set(compute(ranges, get().costDeltas));
    },
  }));
}
