/**
 * Scatter plot authoring form. Submitting adds a view; validation errors
 * come back from the scatter store.
 */

import { useState, useCallback, type FormEvent } from "react";
import { ScatterChart } from "lucide-react";
import { useStore } from "zustand";
import type { ColorMode } from "../types/scatter.ts";
import {
  DEFAULT_GAMMA_SIZE,
  DEFAULT_MAX_SIZE,
  DEFAULT_MIN_SIZE,
  DEFAULT_PALETTE,
  PALETTES,
} from "../lib/constants.ts";
import { columnNames } from "../lib/dataset.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";

const selectClass =
  "rounded-md border border-bg-tertiary bg-bg-primary px-2 py-1 text-sm text-text-primary focus:border-accent focus:outline-none";

export function ScatterConfigForm() {
  const session = useExplorerSession();
  const lastError = useStore(session.scatter, (state) => state.lastError);
  const columns = columnNames(session.dataset);

  const [x, setX] = useState(columns[0] ?? "");
  const [y, setY] = useState(columns[1] ?? columns[0] ?? "");
  const [size, setSize] = useState("");
  const [color, setColor] = useState("");
  const [colorMode, setColorMode] = useState<ColorMode | "">("");
  const [minSize, setMinSize] = useState(DEFAULT_MIN_SIZE);
  const [maxSize, setMaxSize] = useState(DEFAULT_MAX_SIZE);
  const [gammaSize, setGammaSize] = useState(DEFAULT_GAMMA_SIZE);
  const [palette, setPalette] = useState<string>(DEFAULT_PALETTE);

  const handleSubmit = useCallback(
    (e: FormEvent) => {
      e.preventDefault();
      session.configureScatter({
        x,
        y,
        size: size || null,
        color: color || null,
        colorMode: colorMode || undefined,
        minSize,
        maxSize,
        gammaSize,
        palette,
      });
    },
    [session, x, y, size, color, colorMode, minSize, maxSize, gammaSize, palette],
  );

  const columnOptions = columns.map((name) => (
    <option key={name} value={name}>
      {name}
    </option>
  ));

  return (
    <form onSubmit={handleSubmit} className="flex flex-col gap-2" data-testid="scatter-config-form">
      <div className="grid grid-cols-2 gap-2">
        <select value={x} onChange={(e) => setX(e.target.value)} className={selectClass} aria-label="X axis" data-testid="scatter-x">
          {columnOptions}
        </select>
        <select value={y} onChange={(e) => setY(e.target.value)} className={selectClass} aria-label="Y axis" data-testid="scatter-y">
          {columnOptions}
        </select>
        <select value={size} onChange={(e) => setSize(e.target.value)} className={selectClass} aria-label="Size column" data-testid="scatter-size">
          <option value="">No size mapping</option>
          {columnOptions}
        </select>
        <select value={color} onChange={(e) => setColor(e.target.value)} className={selectClass} aria-label="Color column" data-testid="scatter-color">
          <option value="">No color mapping</option>
          {columnOptions}
        </select>
      </div>

      <div className="grid grid-cols-3 gap-2">
        <input type="number" min={1} value={minSize} onChange={(e) => setMinSize(Number(e.target.value))} className={selectClass} aria-label="Min size" />
        <input type="number" min={1} value={maxSize} onChange={(e) => setMaxSize(Number(e.target.value))} className={selectClass} aria-label="Max size" />
        <input type="number" min={0.1} step={0.1} value={gammaSize} onChange={(e) => setGammaSize(Number(e.target.value))} className={selectClass} aria-label="Gamma" />
      </div>

      <div className="grid grid-cols-2 gap-2">
        <select value={palette} onChange={(e) => setPalette(e.target.value)} className={selectClass} aria-label="Palette">
          {PALETTES.map((p) => (
            <option key={p} value={p}>
              {p}
            </option>
          ))}
        </select>
        <select
          value={colorMode}
          onChange={(e) => setColorMode(e.target.value === "continuous" || e.target.value === "discrete" ? e.target.value : "")}
          className={selectClass}
          aria-label="Color mode"
          data-testid="scatter-color-mode"
        >
          <option value="">Auto color mode</option>
          <option value="continuous">Continuous</option>
          <option value="discrete">Discrete</option>
        </select>
      </div>

      <button
        type="submit"
        className="flex items-center justify-center gap-2 rounded-md bg-accent px-4 py-2 text-sm font-medium text-bg-primary hover:bg-accent-hover"
        data-testid="add-scatter-button"
      >
        <ScatterChart className="h-4 w-4" />
        Add Plot
      </button>

      {lastError && (
        <p className="text-sm text-danger" data-testid="scatter-error">
          {lastError.message}
        </p>
      )}
    </form>
  );
}
