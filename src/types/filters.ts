/**
 * Filter pipeline types.
 */

import type { CategoryValue, ColumnKind, RowId } from "./dataset.ts";

export type FilterId = string;

/** Inclusive numeric range. */
export interface NumericParams {
  kind: "numeric";
  lower: number;
  upper: number;
}

export interface CategoricalParams {
  kind: "categorical";
  allowed: readonly CategoryValue[];
}

/** Case-insensitive regex search. Empty pattern matches every row. */
export interface TextParams {
  kind: "text";
  pattern: string;
}

export type FilterParams = NumericParams | CategoricalParams | TextParams;

export interface FilterSpec {
  id: FilterId;
  column: string;
  kind: ColumnKind;
  params: FilterParams;
  /** Insertion order index. Monotonic, never reused. */
  order: number;
}

/** Boolean row mask, index-aligned with `Dataset.rowIds`. */
export interface RowMask {
  values: readonly boolean[];
  /** Number of `true` entries. */
  count: number;
}

/** Equal-width bin over a numeric domain (values, or string lengths for text). */
export interface HistogramBin {
  start: number;
  end: number;
  baseline: number;
  kept: number;
}

export interface CategoryBin {
  value: CategoryValue;
  baseline: number;
  kept: number;
}

export type Distribution =
  | { kind: "numeric"; bins: readonly HistogramBin[] }
  | { kind: "categorical"; bins: readonly CategoryBin[] }
  | { kind: "text"; bins: readonly HistogramBin[] };

/**
 * What the data looks like with every active filter except one applied.
 * `kept` counts the baseline rows that the filter itself lets through.
 */
export interface Baseline {
  filterId: FilterId;
  column: string;
  mask: RowMask;
  keptCount: number;
  distribution: Distribution;
}

/** Outbound notification payload for the presentation layer. */
export interface EngineSnapshot {
  currentMask: RowMask;
  perFilterBaselines: ReadonlyMap<FilterId, Baseline>;
  currentSelection: ReadonlySet<RowId>;
}
