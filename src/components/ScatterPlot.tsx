/**
 * SVG scatter plot for one view, with box and lasso brushing.
 *
 * A brush replaces the shared selection; a click without dragging clears
 * it. Rows the filters hide are not drawn unless selected; those are drawn
 * faded and cannot be brushed.
 */

import { useState, useCallback, type MouseEvent } from "react";
import { Lasso, SquareDashed, X } from "lucide-react";
import type { AxisScale, ScatterProjection } from "../types/scatter.ts";
import { axisExtent, rowsInBox, rowsInLasso } from "../lib/scatter.ts";
import { pointColor } from "../lib/colors.ts";
import { formatCell } from "../lib/constants.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";
import { useScatterView } from "../hooks/useScatterView.ts";

const WIDTH = 600;
const HEIGHT = 400;
const PADDING = 32;

type BrushMode = "box" | "lasso";

interface PixelScale {
  toPixel: (x: number, y: number) => [number, number];
  fromPixel: (px: number, py: number) => [number, number];
}

/** Hover label for a plot coordinate; band axes show the category. */
function axisLabel(axis: AxisScale, value: number): string {
  if (axis.kind === "band") return formatCell(axis.categories[value] ?? null);
  return formatCell(value);
}

function pixelScale(projection: ScatterProjection): PixelScale {
  const [x0, x1] = axisExtent(projection.xAxis);
  const [y0, y1] = axisExtent(projection.yAxis);
  const w = WIDTH - 2 * PADDING;
  const h = HEIGHT - 2 * PADDING;
  return {
    toPixel: (x, y) => [PADDING + ((x - x0) / (x1 - x0)) * w, HEIGHT - PADDING - ((y - y0) / (y1 - y0)) * h],
    fromPixel: (px, py) => [x0 + ((px - PADDING) / w) * (x1 - x0), y0 + ((HEIGHT - PADDING - py) / h) * (y1 - y0)],
  };
}

interface ScatterPlotProps {
  viewId: string;
}

export function ScatterPlot({ viewId }: ScatterPlotProps) {
  const { reportSelection, clearSelection, scatter } = useExplorerSession();
  const { view, projection } = useScatterView(viewId);
  const [mode, setMode] = useState<BrushMode>("box");
  const [path, setPath] = useState<[number, number][]>([]);

  const pointer = (e: MouseEvent<SVGSVGElement>): [number, number] => {
    const rect = e.currentTarget.getBoundingClientRect();
    return [e.clientX - rect.left, e.clientY - rect.top];
  };

  const finishBrush = useCallback(
    (end: [number, number]) => {
      if (!projection || path.length === 0) return;
      const { fromPixel } = pixelScale(projection);
      const [sx, sy] = path[0];
      if (Math.abs(end[0] - sx) < 3 && Math.abs(end[1] - sy) < 3) {
        clearSelection();
      } else if (mode === "box") {
        const [x0, y0] = fromPixel(sx, sy);
        const [x1, y1] = fromPixel(end[0], end[1]);
        reportSelection(rowsInBox(projection.points, { x0, y0, x1, y1 }));
      } else {
        const polygon = [...path, end].map(([px, py]) => fromPixel(px, py));
        reportSelection(rowsInLasso(projection.points, polygon));
      }
      setPath([]);
    },
    [projection, path, mode, reportSelection, clearSelection],
  );

  if (!view || !projection) return null;

  const { toPixel } = pixelScale(projection);
  const { spec } = view;
  const visiblePoints = projection.points.filter((p) => !p.dimmed).length;

  return (
    <div className="flex flex-col gap-2 rounded-lg bg-bg-secondary p-3" data-testid={`scatter-${viewId}`}>
      <div className="flex items-center justify-between">
        <h3 className="text-sm font-medium text-text-primary">
          {spec.y} vs {spec.x}
        </h3>
        <div className="flex items-center gap-1">
          <button
            onClick={() => setMode("box")}
            aria-pressed={mode === "box"}
            aria-label="Box select"
            className="rounded p-1 text-text-muted hover:text-text-primary aria-pressed:text-accent"
          >
            <SquareDashed className="h-4 w-4" />
          </button>
          <button
            onClick={() => setMode("lasso")}
            aria-pressed={mode === "lasso"}
            aria-label="Lasso select"
            className="rounded p-1 text-text-muted hover:text-text-primary aria-pressed:text-accent"
          >
            <Lasso className="h-4 w-4" />
          </button>
          <button
            onClick={() => scatter.getState().removeView(viewId)}
            aria-label="Remove plot"
            className="rounded p-1 text-text-muted hover:text-text-primary"
            data-testid={`remove-scatter-${viewId}`}
          >
            <X className="h-4 w-4" />
          </button>
        </div>
      </div>

      <svg
        width={WIDTH}
        height={HEIGHT}
        data-palette={spec.palette}
        className="cursor-crosshair select-none rounded bg-bg-primary"
        onMouseDown={(e) => setPath([pointer(e)])}
        onMouseMove={(e) => {
          if (path.length > 0) setPath(mode === "lasso" ? [...path, pointer(e)] : [path[0], pointer(e)]);
        }}
        onMouseUp={(e) => finishBrush(pointer(e))}
        data-testid={`scatter-svg-${viewId}`}
      >
        {projection.points.map((point) => {
          const [cx, cy] = toPixel(point.x, point.y);
          return (
            <circle
              key={String(point.rowId)}
              cx={cx}
              cy={cy}
              r={point.size / 2}
              fill={pointColor(projection, point.color)}
              fillOpacity={point.dimmed ? 0.15 : point.highlighted ? 0.95 : 0.5}
              stroke={point.highlighted ? "#f8fafc" : "none"}
              data-highlighted={point.highlighted}
              data-dimmed={point.dimmed}
              data-row-id={String(point.rowId)}
            >
              <title>
                {`Row ${String(point.rowId)}: ${spec.x} ${axisLabel(projection.xAxis, point.x)}, ${spec.y} ${axisLabel(projection.yAxis, point.y)}`}
              </title>
            </circle>
          );
        })}
        {path.length > 1 && (
          <polyline
            points={(mode === "box"
              ? [path[0], [path[1][0], path[0][1]], path[1], [path[0][0], path[1][1]], path[0]]
              : path
            )
              .map(([px, py]) => `${px},${py}`)
              .join(" ")}
            fill="none"
            stroke="#94a3b8"
            strokeDasharray="4 2"
          />
        )}
      </svg>

      <p className="text-xs text-text-muted" data-testid={`scatter-summary-${viewId}`}>
        {visiblePoints} points
        {projection.hiddenSelection.size > 0 &&
          ` · ${projection.hiddenSelection.size} selected rows hidden by filters`}
      </p>
    </div>
  );
}
