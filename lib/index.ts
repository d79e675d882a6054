export * from "@/lib/types/zod";
export * from "@/lib/model/constants";
export * from "@/lib/model/errors";
export * from "@/lib/model/params";
export * from "@/lib/model/engine";
export * from "@/lib/model/sensitivity";
export * from "@/lib/model/summary";
export * from "@/lib/model/validation";
export { loadModelConfig, type ModelConfig } from "@/lib/model/config";
export { projectionToCsv } from "@/lib/export/projectionToCsv";
export { buildVerificationExport, verificationToJson, type VerificationExport } from "@/lib/export/verification";
export { summaryToLines } from "@/lib/export/summaryToText";
export { diffSnapshots, formatParamValue, type ParameterChange } from "@/lib/utils/snapshot-diff";
export { describeParameters, groupParameters, type ParameterControl } from "@/lib/utils/parameter-controls";
export { formatCurrency, formatMillions, formatRange } from "@/lib/utils/format";
export { createParameterStore, type ParameterStore } from "@/stores/parameters";

import { loadModelConfig } from "@/lib/model/config";
import { createParameterStore } from "@/stores/parameters";

/** New session store with sensitivity deltas taken from the environment. */
export function createSession(env: Record<string, string | undefined> = process.env) {
  return createParameterStore({ costDeltas: loadModelConfig(env).costDeltas });
}
