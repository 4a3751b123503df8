/**
 * Engine constants and display helpers.
 */

import type { ColumnKind } from "../types/dataset.ts";

/** Columns with fewer distinct values than this are categorical. */
export const CATEGORICAL_CARDINALITY_THRESHOLD = 10;

/** Histogram bins for numeric baseline distributions. */
export const NUMERIC_BIN_COUNT = 30;

/** Histogram bins for text-length baseline distributions. */
export const TEXT_LENGTH_BIN_COUNT = 20;

/** Rows per page in the filtered data table. */
export const TABLE_PAGE_SIZE = 10;

export const DEFAULT_MIN_SIZE = 5;
export const DEFAULT_MAX_SIZE = 20;
export const DEFAULT_GAMMA_SIZE = 1;
export const DEFAULT_PALETTE = "viridis";

/** Palettes offered by the scatter configuration form. */
export const PALETTES = [
  "viridis",
  "plasma",
  "inferno",
  "magma",
  "cividis",
  "Spectral",
  "RdYlBu",
  "RdBu",
  "coolwarm",
  "Set1",
  "Set2",
  "Set3",
] as const;

/** Human-readable labels for column kinds. */
export const KIND_LABELS: Record<ColumnKind, string> = {
  numeric: "Numeric",
  categorical: "Categorical",
  text: "Text",
};

/** Format a cell for table and legend display. */
export function formatCell(value: number | string | null): string {
  if (value === null) return "—";
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "—";
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  return value;
}
