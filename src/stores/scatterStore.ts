/**
 * Zustand store for the scatter views authored over the dataset.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { ColumnProfile, Dataset } from "../types/dataset.ts";
import type { ScatterPlotInput, ScatterView } from "../types/scatter.ts";
import { EngineError, attempt, type Result } from "../lib/errors.ts";
import type { EngineLogger } from "../lib/logger.ts";
import { configureScatter } from "../lib/scatter.ts";

export interface ScatterState {
  views: readonly ScatterView[];
  nextId: number;
  lastError: EngineError | null;

  /** Validate and add a view. */
  addView: (input: ScatterPlotInput) => Result<ScatterView>;
  /** Validate and replace a view's spec. The view keeps its id and position. */
  updateView: (id: string, input: ScatterPlotInput) => Result<ScatterView>;
  removeView: (id: string) => void;
}

export type ScatterStore = StoreApi<ScatterState>;

export interface ScatterStoreOptions {
  dataset: Dataset;
  profiles: ReadonlyMap<string, ColumnProfile>;
  logger: EngineLogger;
}

export function createScatterStore({ dataset, profiles, logger }: ScatterStoreOptions): ScatterStore {
  return createStore<ScatterState>((set, get) => {
    const record = <T>(result: Result<T>): Result<T> => {
      if (!result.ok) {
        logger.warn({ kind: result.error.kind, subject: result.error.subject }, result.error.message);
        set({ lastError: result.error });
      }
      return result;
    };

    return {
      views: [],
      nextId: 1,
      lastError: null,

      addView: (input) =>
        record(
          attempt(() => {
            const spec = configureScatter(input, dataset, profiles);
            const { views, nextId } = get();
            const view: ScatterView = { id: `scatter-${nextId}`, spec };
            set({ views: [...views, view], nextId: nextId + 1, lastError: null });
            return view;
          }),
        ),

      updateView: (id, input) =>
        record(
          attempt(() => {
            const { views } = get();
            if (!views.some((v) => v.id === id)) {
              throw new EngineError("UnknownView", `Unknown scatter view "${id}"`, id);
            }
            const view: ScatterView = { id, spec: configureScatter(input, dataset, profiles) };
            set({ views: views.map((v) => (v.id === id ? view : v)), lastError: null });
            return view;
          }),
        ),

      removeView: (id) => {
        const { views } = get();
        if (!views.some((v) => v.id === id)) {
          logger.warn({ viewId: id }, "removeView: no such view");
          return;
        }
        set({ views: views.filter((v) => v.id !== id) });
      },
    };
  });
}
