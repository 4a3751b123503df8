/**
 * Column classification: computed once per dataset snapshot.
 *
 * Kind rule, over non-missing values:
 *   distinct < CATEGORICAL_CARDINALITY_THRESHOLD  → categorical
 *   every value a finite number                   → numeric
 *   otherwise                                     → text
 */

import type {
  CategoryValue,
  CellValue,
  ColumnProfile,
  Dataset,
} from "../types/dataset.ts";
import { CATEGORICAL_CARDINALITY_THRESHOLD } from "./constants.ts";
import { isMissing } from "./dataset.ts";
import { EngineError } from "./errors.ts";

export interface Classification {
  profiles: ReadonlyMap<string, ColumnProfile>;
  /** Columns that could not be classified. Excluded from filtering. */
  invalid: readonly EngineError[];
}

/** Numbers ascending, then strings in lexical order. */
export function compareCategories(a: CategoryValue, b: CategoryValue): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Profile a single column.
 * @throws EngineError `InvalidColumn` when every value is missing.
 */
export function profileColumn(name: string, values: readonly CellValue[]): ColumnProfile {
  const present: CategoryValue[] = [];
  for (const value of values) {
    if (value !== null && !isMissing(value)) present.push(value);
  }

  if (present.length === 0) {
    throw new EngineError(
      "InvalidColumn",
      `Column "${name}" has no non-missing values`,
      name,
    );
  }

  const distinct = new Set(present);
  const base = {
    name,
    distinctCount: distinct.size,
    missingCount: values.length - present.length,
  };

  if (distinct.size < CATEGORICAL_CARDINALITY_THRESHOLD) {
    return {
      ...base,
      kind: "categorical",
      suggestedWidget: "multi-select",
      categories: [...distinct].sort(compareCategories),
    };
  }

  const numbers: number[] = [];
  for (const value of present) {
    if (typeof value !== "number" || !Number.isFinite(value)) break;
    numbers.push(value);
  }

  if (numbers.length === present.length) {
    let min = Infinity;
    let max = -Infinity;
    for (const n of numbers) {
      if (n < min) min = n;
      if (n > max) max = n;
    }
    return { ...base, kind: "numeric", suggestedWidget: "range-slider", min, max };
  }

  let minLength = Infinity;
  let maxLength = 0;
  for (const value of present) {
    const length = String(value).length;
    if (length < minLength) minLength = length;
    if (length > maxLength) maxLength = length;
  }
  return { ...base, kind: "text", suggestedWidget: "regex-input", minLength, maxLength };
}

/** Classify every column of the dataset. */
export function classify(dataset: Dataset): Classification {
  const profiles = new Map<string, ColumnProfile>();
  const invalid: EngineError[] = [];

  for (const column of dataset.columns) {
    try {
      profiles.set(column.name, profileColumn(column.name, column.values));
    } catch (err: unknown) {
      if (!(err instanceof EngineError)) throw err;
      invalid.push(err);
    }
  }

  return { profiles, invalid };
}

/** Profiled column names, in dataset order. */
export function filterableColumns(profiles: ReadonlyMap<string, ColumnProfile>): string[] {
  return [...profiles.keys()];
}
