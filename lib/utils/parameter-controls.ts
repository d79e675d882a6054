/**
 * Control descriptors for the input surface: one slider per parameter.
 */

import { PARAM_KEYS, type ParamKey, type ParameterSet } from "@/lib/types/zod";
import { HELP_PARAMS, PARAM_CONTROLS, formatHelpEntry, type ParamGroup } from "@/lib/copy/help";

export interface ParameterControl {
  key: ParamKey;
  label: string;
  help: string;
  group: ParamGroup;
  min: number;
  max: number;
  step: number;
  value: number;
}

export function describeParameters(ranges: ParameterSet): ParameterControl[] {
  return PARAM_KEYS.map((key) => ({
    key,
    label: HELP_PARAMS[key].title,
    help: formatHelpEntry(HELP_PARAMS[key]),
    group: PARAM_CONTROLS[key].group,
    min: ranges[key].min,
    max: ranges[key].max,
    step: PARAM_CONTROLS[key].step,
    value: ranges[key].value,
  }));
}

/** Controls grouped for sidebar sections, in first-seen group order. */
export function groupParameters(controls: ParameterControl[]): Map<ParamGroup, ParameterControl[]> {
  const byGroup = new Map<ParamGroup, ParameterControl[]>();
  for (const c of controls) {
    const list = byGroup.get(c.group) ?? [];
    list.push(c);
    byGroup.set(c.group, list);
  }
  return byGroup;
}
