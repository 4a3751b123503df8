/**
 * Minimal colour mapping for the built-in SVG scatter renderer.
 */

import type { CellValue } from "../types/dataset.ts";
import type { ScatterProjection } from "../types/scatter.ts";

/** Ten-step categorical scale. */
const CATEGORY_COLORS = [
  "#4e79a7",
  "#f28e2b",
  "#e15759",
  "#76b7b2",
  "#59a14f",
  "#edc948",
  "#b07aa1",
  "#ff9da7",
  "#9c755f",
  "#bab0ac",
];

export const DEFAULT_POINT_COLOR = "#38bdf8";

/** Blue (low) to red (high) over [min, max]. */
export function continuousColor(value: number, min: number, max: number): string {
  const t = max === min ? 0 : Math.min(Math.max((value - min) / (max - min), 0), 1);
  const hue = Math.round(240 * (1 - t));
  return `hsl(${hue}, 70%, 55%)`;
}

export function categoryColor(index: number): string {
  return CATEGORY_COLORS[((index % CATEGORY_COLORS.length) + CATEGORY_COLORS.length) % CATEGORY_COLORS.length];
}

/** Fill for a point's colour value under the projection's colour scale. */
export function pointColor(projection: ScatterProjection, value: CellValue): string {
  if (value === null) return DEFAULT_POINT_COLOR;
  const { colorDomain, colorCategories } = projection;
  if (colorDomain && typeof value === "number") {
    return continuousColor(value, colorDomain.min, colorDomain.max);
  }
  if (colorCategories) {
    const index = colorCategories.indexOf(value);
    return index >= 0 ? categoryColor(index) : DEFAULT_POINT_COLOR;
  }
  return DEFAULT_POINT_COLOR;
}
