/**
 * Errors raised for structurally invalid model input.
 * Codes match the ValidationResult codes used by the guardrails.
 */

import type { ParamKey } from "@/lib/types/zod";

export type ModelErrorCode = "INVALID_HORIZON" | "MISSING_PARAMETER";

export class ModelError extends Error {
  readonly code: ModelErrorCode;

  constructor(code: ModelErrorCode, message: string) {
    super(message);
    this.name = "ModelError";
    this.code = code;
  }
}

/** Horizon must be a whole number of years, at least 1. */
export class InvalidHorizonError extends ModelError {
  readonly horizon: number;

  constructor(horizon: number) {
    super("INVALID_HORIZON", `Horizon must be an integer of at least 1 year (got ${horizon})`);
    this.name = "InvalidHorizonError";
    this.horizon = horizon;
  }
}

export class MissingParameterError extends ModelError {
  readonly key: ParamKey;

  constructor(key: ParamKey) {
    super("MISSING_PARAMETER", `Missing parameter: ${key}`);
    this.name = "MissingParameterError";
    this.key = key;
  }
}

/** Throws unless horizon is an integer ≥ 1. */
export function assertHorizon(horizon: number): void {
  if (!Number.isInteger(horizon) || horizon < 1) {
    throw new InvalidHorizonError(horizon);
  }
}
