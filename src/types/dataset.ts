/**
 * Dataset and column profile types shared by the engine and the views.
 */

/** Stable row identity assigned at load time. Never renumbered. */
export type RowId = number | string;

/** A single cell. `null`, `NaN` and `""` count as missing. */
export type CellValue = number | string | null;

/** Value kinds a category can hold. */
export type CategoryValue = number | string;

export interface DatasetColumn {
  name: string;
  values: readonly CellValue[];
}

/** Immutable columnar snapshot. `rowIds[i]` identifies row `i` of every column. */
export interface Dataset {
  rowIds: readonly RowId[];
  columns: readonly DatasetColumn[];
}

/** Column kind discriminator: drives widget choice and predicate shape. */
export type ColumnKind = "numeric" | "categorical" | "text";

export type SuggestedWidget = "range-slider" | "multi-select" | "regex-input";

interface ProfileBase {
  name: string;
  distinctCount: number;
  missingCount: number;
}

export interface NumericProfile extends ProfileBase {
  kind: "numeric";
  suggestedWidget: "range-slider";
  min: number;
  max: number;
}

export interface CategoricalProfile extends ProfileBase {
  kind: "categorical";
  suggestedWidget: "multi-select";
  /** Distinct non-missing values, numbers first in ascending order, then strings. */
  categories: readonly CategoryValue[];
}

export interface TextProfile extends ProfileBase {
  kind: "text";
  suggestedWidget: "regex-input";
  minLength: number;
  maxLength: number;
}

export type ColumnProfile = NumericProfile | CategoricalProfile | TextProfile;
