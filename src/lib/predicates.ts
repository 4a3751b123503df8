/**
 * Filter parameters: kind defaults, validation against the column domain,
 * and compilation to a per-cell predicate.
 */

import type { CellValue, ColumnProfile } from "../types/dataset.ts";
import type { FilterParams } from "../types/filters.ts";
import { isMissing } from "./dataset.ts";
import { EngineError } from "./errors.ts";

export type CellPredicate = (value: CellValue) => boolean;

/** Parameters a freshly added filter starts with: everything passes. */
export function defaultParams(profile: ColumnProfile): FilterParams {
  switch (profile.kind) {
    case "numeric":
      return { kind: "numeric", lower: profile.min, upper: profile.max };
    case "categorical":
      return { kind: "categorical", allowed: [...profile.categories] };
    case "text":
      return { kind: "text", pattern: "" };
  }
}

/**
 * Compile a text filter pattern, case-insensitive.
 * @throws EngineError `InvalidPattern`
 */
export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, "i");
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EngineError("InvalidPattern", `Invalid pattern "${pattern}": ${reason}`, pattern);
  }
}

function kindMismatch(profile: ColumnProfile, params: FilterParams): EngineError {
  return new EngineError(
    "OutOfDomainParameter",
    `Column "${profile.name}" is ${profile.kind}, got ${params.kind} parameters`,
    profile.name,
  );
}

/**
 * Check `params` against the column profile and return a normalized copy.
 * Categorical sets are deduplicated and ordered like the profile.
 */
export function validateParams(profile: ColumnProfile, params: FilterParams): FilterParams {
  const column = profile.name;

  switch (profile.kind) {
    case "numeric": {
      if (params.kind !== "numeric") throw kindMismatch(profile, params);
      const { lower, upper } = params;
      if (!Number.isFinite(lower) || !Number.isFinite(upper)) {
        throw new EngineError("OutOfDomainParameter", `Bounds for "${column}" must be finite`, column);
      }
      if (lower > upper) {
        throw new EngineError(
          "OutOfDomainParameter",
          `Lower bound ${lower} exceeds upper bound ${upper} for "${column}"`,
          column,
        );
      }
      if (lower < profile.min || upper > profile.max) {
        throw new EngineError(
          "OutOfDomainParameter",
          `Range [${lower}, ${upper}] lies outside [${profile.min}, ${profile.max}] for "${column}"`,
          column,
        );
      }
      return { kind: "numeric", lower, upper };
    }
    case "categorical": {
      if (params.kind !== "categorical") throw kindMismatch(profile, params);
      const requested = new Set(params.allowed);
      const known = new Set(profile.categories);
      const unknown = [...requested].filter((v) => !known.has(v));
      if (unknown.length > 0) {
        throw new EngineError(
          "OutOfDomainParameter",
          `Unknown values for "${column}": ${unknown.map(String).join(", ")}`,
          column,
        );
      }
      return {
        kind: "categorical",
        allowed: profile.categories.filter((v) => requested.has(v)),
      };
    }
    case "text":
      if (params.kind !== "text") throw kindMismatch(profile, params);
      compilePattern(params.pattern);
      return { kind: "text", pattern: params.pattern };
  }
}

/** Turn validated parameters into a cell predicate. */
export function compilePredicate(params: FilterParams): CellPredicate {
  switch (params.kind) {
    case "numeric": {
      const { lower, upper } = params;
      return (value) => typeof value === "number" && value >= lower && value <= upper;
    }
    case "categorical": {
      if (params.allowed.length === 0) return () => true;
      const allowed = new Set(params.allowed);
      return (value) => value !== null && !isMissing(value) && allowed.has(value);
    }
    case "text": {
      if (params.pattern === "") return () => true;
      const regex = compilePattern(params.pattern);
      return (value) => value !== null && !isMissing(value) && regex.test(String(value));
    }
  }
}
