/**
 * Scatter plot configuration and projection types.
 */

import type { CategoryValue, CellValue, RowId } from "./dataset.ts";

export type ColorMode = "continuous" | "discrete";

/** User-supplied configuration; omitted fields take defaults. */
export interface ScatterPlotInput {
  x: string;
  y: string;
  size?: string | null;
  minSize?: number;
  maxSize?: number;
  gammaSize?: number;
  color?: string | null;
  palette?: string;
  colorMode?: ColorMode;
}

/** Validated configuration. */
export interface ScatterPlotSpec {
  x: string;
  y: string;
  size: string | null;
  minSize: number;
  maxSize: number;
  gammaSize: number;
  color: string | null;
  /** Palette identifier, interpreted by the renderer. */
  palette: string;
  colorMode: ColorMode;
}

export interface ScatterView {
  id: string;
  spec: ScatterPlotSpec;
}

export interface ScatterPoint {
  rowId: RowId;
  /** Plot coordinates; categorical axes use the category index. */
  x: number;
  y: number;
  size: number;
  color: CellValue;
  highlighted: boolean;
  /** Selected row the filters hide. Drawn faded, never brushed. */
  dimmed: boolean;
}

/** One axis: numeric extent, or the category labels behind each index. */
export type AxisScale =
  | { kind: "linear"; min: number; max: number }
  | { kind: "band"; categories: readonly CategoryValue[] };

export interface ScatterProjection {
  points: readonly ScatterPoint[];
  xAxis: AxisScale;
  yAxis: AxisScale;
  /** Selected rows the current filters hide. Rendered dimmed or not at all. */
  hiddenSelection: ReadonlySet<RowId>;
  colorDomain: { min: number; max: number } | null;
  colorCategories: readonly CategoryValue[] | null;
}

export interface Box {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export type Polygon = readonly (readonly [number, number])[];
