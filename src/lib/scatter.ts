/**
 * Scatter plot configuration, size mapping, point projection and brushing.
 */

import type {
  CategoryValue,
  CellValue,
  ColumnProfile,
  Dataset,
  RowId,
} from "../types/dataset.ts";
import type { RowMask } from "../types/filters.ts";
import type {
  AxisScale,
  Box,
  Polygon,
  ScatterPlotInput,
  ScatterPlotSpec,
  ScatterPoint,
  ScatterProjection,
} from "../types/scatter.ts";
import {
  DEFAULT_GAMMA_SIZE,
  DEFAULT_MAX_SIZE,
  DEFAULT_MIN_SIZE,
  DEFAULT_PALETTE,
} from "./constants.ts";
import { compareCategories } from "./columnProfiler.ts";
import { getColumn, isMissing } from "./dataset.ts";
import { EngineError } from "./errors.ts";

function requireColumn(dataset: Dataset, column: string, role: string): void {
  if (!getColumn(dataset, column)) {
    throw new EngineError("UnknownColumn", `Unknown ${role} column "${column}"`, column);
  }
}

/**
 * Validate a scatter configuration and fill in defaults.
 * Palette identifiers are passed through unchecked.
 */
export function configureScatter(
  input: ScatterPlotInput,
  dataset: Dataset,
  profiles: ReadonlyMap<string, ColumnProfile>,
): ScatterPlotSpec {
  requireColumn(dataset, input.x, "x");
  requireColumn(dataset, input.y, "y");

  const size = input.size ?? null;
  if (size !== null) {
    requireColumn(dataset, size, "size");
    if (profiles.get(size)?.kind !== "numeric") {
      throw new EngineError("InvalidSizeColumn", `Size column "${size}" must be numeric`, size);
    }
  }

  const color = input.color ?? null;
  let colorMode = input.colorMode ?? "discrete";
  if (color !== null) {
    requireColumn(dataset, color, "color");
    const isNumeric = profiles.get(color)?.kind === "numeric";
    colorMode = input.colorMode ?? (isNumeric ? "continuous" : "discrete");
    if (colorMode === "continuous" && !isNumeric) {
      throw new EngineError(
        "InvalidColorMode",
        `Continuous color needs a numeric column, "${color}" is not`,
        color,
      );
    }
  }

  const minSize = input.minSize ?? DEFAULT_MIN_SIZE;
  const maxSize = input.maxSize ?? DEFAULT_MAX_SIZE;
  const gammaSize = input.gammaSize ?? DEFAULT_GAMMA_SIZE;
  if (!(minSize > 0) || !(maxSize >= minSize) || !Number.isFinite(maxSize)) {
    throw new EngineError(
      "OutOfDomainParameter",
      `Size range [${minSize}, ${maxSize}] must be positive and ordered`,
    );
  }
  if (!(gammaSize > 0) || !Number.isFinite(gammaSize)) {
    throw new EngineError("OutOfDomainParameter", `Gamma ${gammaSize} must be positive`);
  }

  return {
    x: input.x,
    y: input.y,
    size,
    minSize,
    maxSize,
    gammaSize,
    color,
    palette: input.palette ?? DEFAULT_PALETTE,
    colorMode,
  };
}

/**
 * minSize + (maxSize - minSize) * ((value - colMin) / (colMax - colMin)) ^ gammaSize
 *
 * A flat column or a missing value maps to minSize.
 */
export function scaleSize(
  value: CellValue,
  colMin: number,
  colMax: number,
  spec: Pick<ScatterPlotSpec, "minSize" | "maxSize" | "gammaSize">,
): number {
  if (typeof value !== "number" || Number.isNaN(value) || colMin === colMax) {
    return spec.minSize;
  }
  const normalized = Math.min(Math.max((value - colMin) / (colMax - colMin), 0), 1);
  return spec.minSize + (spec.maxSize - spec.minSize) * normalized ** spec.gammaSize;
}

function distinctValues(values: readonly CellValue[]): CategoryValue[] {
  const distinct = new Set<CategoryValue>();
  for (const value of values) {
    if (value !== null && !isMissing(value)) distinct.add(value);
  }
  return [...distinct].sort(compareCategories);
}

function axisScale(profile: ColumnProfile | undefined, values: readonly CellValue[]): AxisScale {
  if (!profile) return { kind: "linear", min: 0, max: 1 };
  switch (profile.kind) {
    case "numeric":
      return { kind: "linear", min: profile.min, max: profile.max };
    case "categorical":
      return { kind: "band", categories: profile.categories };
    case "text":
      return { kind: "band", categories: distinctValues(values) };
  }
}

/** Plot coordinate for a cell, or null when it cannot be placed. */
function coordinate(axis: AxisScale, index: ReadonlyMap<CategoryValue, number>, value: CellValue): number | null {
  if (value === null || isMissing(value)) return null;
  if (axis.kind === "linear") return typeof value === "number" ? value : null;
  return index.get(value) ?? null;
}

function categoryIndex(axis: AxisScale): ReadonlyMap<CategoryValue, number> {
  return new Map(axis.kind === "band" ? axis.categories.map((c, i) => [c, i]) : []);
}

/**
 * Points for every visible row with a placeable x and y.
 * A visible point is highlighted iff its row is selected. Selected rows the
 * mask hides are reported in `hiddenSelection` and, when placeable, kept as
 * dimmed points.
 */
export function projectScatter(
  dataset: Dataset,
  spec: ScatterPlotSpec,
  profiles: ReadonlyMap<string, ColumnProfile>,
  mask: RowMask,
  selection: ReadonlySet<RowId>,
): ScatterProjection {
  const xValues = getColumn(dataset, spec.x)?.values ?? [];
  const yValues = getColumn(dataset, spec.y)?.values ?? [];
  const xAxis = axisScale(profiles.get(spec.x), xValues);
  const yAxis = axisScale(profiles.get(spec.y), yValues);
  const xIndex = categoryIndex(xAxis);
  const yIndex = categoryIndex(yAxis);

  const sizeProfile = spec.size !== null ? profiles.get(spec.size) : undefined;
  const sizeValues = spec.size !== null ? (getColumn(dataset, spec.size)?.values ?? []) : [];
  const colorProfile = spec.color !== null ? profiles.get(spec.color) : undefined;
  const colorValues = spec.color !== null ? (getColumn(dataset, spec.color)?.values ?? []) : [];

  const points: ScatterPoint[] = [];
  const hidden = new Set<RowId>();

  dataset.rowIds.forEach((rowId, row) => {
    const visible = mask.values[row];
    const selected = selection.has(rowId);
    if (!visible && selected) hidden.add(rowId);
    if (!visible && !selected) return;

    const x = coordinate(xAxis, xIndex, xValues[row]);
    const y = coordinate(yAxis, yIndex, yValues[row]);
    if (x === null || y === null) return;

    const size =
      sizeProfile?.kind === "numeric"
        ? scaleSize(sizeValues[row], sizeProfile.min, sizeProfile.max, spec)
        : spec.minSize;

    points.push({
      rowId,
      x,
      y,
      size,
      color: spec.color !== null ? colorValues[row] : null,
      highlighted: visible && selected,
      dimmed: !visible,
    });
  });

  let colorDomain: ScatterProjection["colorDomain"] = null;
  let colorCategories: ScatterProjection["colorCategories"] = null;
  if (colorProfile) {
    if (spec.colorMode === "continuous" && colorProfile.kind === "numeric") {
      colorDomain = { min: colorProfile.min, max: colorProfile.max };
    } else {
      colorCategories =
        colorProfile.kind === "categorical" ? colorProfile.categories : distinctValues(colorValues);
    }
  }

  return { points, xAxis, yAxis, hiddenSelection: hidden, colorDomain, colorCategories };
}

/** Rows whose visible point falls inside the box (edges included, corners in any order). */
export function rowsInBox(points: readonly ScatterPoint[], box: Box): RowId[] {
  const [xMin, xMax] = box.x0 <= box.x1 ? [box.x0, box.x1] : [box.x1, box.x0];
  const [yMin, yMax] = box.y0 <= box.y1 ? [box.y0, box.y1] : [box.y1, box.y0];
  return points
    .filter((p) => !p.dimmed && p.x >= xMin && p.x <= xMax && p.y >= yMin && p.y <= yMax)
    .map((p) => p.rowId);
}

/** Even-odd ray casting. */
function insidePolygon(x: number, y: number, polygon: Polygon): boolean {
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const [xi, yi] = polygon[i];
    const [xj, yj] = polygon[j];
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

/** Rows whose point falls inside the lasso polygon. Dimmed points are skipped. */
export function rowsInLasso(points: readonly ScatterPoint[], polygon: Polygon): RowId[] {
  if (polygon.length < 3) return [];
  return points
    .filter((p) => !p.dimmed && insidePolygon(p.x, p.y, polygon))
    .map((p) => p.rowId);
}

/** Extent of an axis in plot coordinates, padded by half a band for categories. */
export function axisExtent(axis: AxisScale): [number, number] {
  if (axis.kind === "band") return [-0.5, Math.max(axis.categories.length - 0.5, 0.5)];
  return axis.min === axis.max ? [axis.min - 0.5, axis.max + 0.5] : [axis.min, axis.max];
}
