/**
 * Zustand store for the filter pipeline.
 *
 * Owns the ordered filter specs. Every mutation recomputes the mask and
 * all baselines and commits them in a single `set`, so subscribers only
 * ever see consistent state.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { ColumnProfile, Dataset } from "../types/dataset.ts";
import type {
  Baseline,
  FilterId,
  FilterParams,
  FilterSpec,
  RowMask,
} from "../types/filters.ts";
import { getColumn } from "../lib/dataset.ts";
import { EngineError, attempt, type Result } from "../lib/errors.ts";
import type { EngineLogger } from "../lib/logger.ts";
import {
  computeBaselines,
  evaluateFilters,
  fullMask,
  maskFromEvaluation,
} from "../lib/mask.ts";
import { defaultParams, validateParams } from "../lib/predicates.ts";

export interface FilterPipelineState {
  /** Active filters, in insertion order. */
  filters: readonly FilterSpec[];
  /** AND of every active filter. */
  mask: RowMask;
  baselines: ReadonlyMap<FilterId, Baseline>;
  /** Next insertion order index. Never decreases. */
  nextOrder: number;
  /** Most recent rejected command, cleared by the next successful one. */
  lastError: EngineError | null;

  /** Append a filter with parameters that keep every value of the column. */
  addFilter: (column: string) => Result<FilterSpec>;
  /** Remove a filter. Unknown ids are ignored with a warning. */
  removeFilter: (id: FilterId) => void;
  /** Replace a filter's parameters in place. */
  updateFilter: (id: FilterId, params: FilterParams) => Result<FilterSpec>;
  /** Remove every filter. */
  clearFilters: () => void;
  currentMask: () => RowMask;
  baselineFor: (id: FilterId) => Baseline | undefined;
}

export type FilterPipeline = StoreApi<FilterPipelineState>;

export interface FilterPipelineOptions {
  dataset: Dataset;
  profiles: ReadonlyMap<string, ColumnProfile>;
  logger: EngineLogger;
}

export function createFilterPipeline({
  dataset,
  profiles,
  logger,
}: FilterPipelineOptions): FilterPipeline {
  /** Derived state for a new filter list. */
  const derive = (filters: readonly FilterSpec[]) => {
    const evaluation = evaluateFilters(dataset, filters);
    return {
      filters: Object.freeze([...evaluation.filters]),
      mask: maskFromEvaluation(evaluation),
      baselines: computeBaselines(dataset, profiles, evaluation),
    };
  };

  const profileFor = (column: string): ColumnProfile => {
    if (!getColumn(dataset, column)) {
      throw new EngineError("UnknownColumn", `Unknown column "${column}"`, column);
    }
    const profile = profiles.get(column);
    if (!profile) {
      throw new EngineError(
        "InvalidColumn",
        `Column "${column}" cannot be filtered: it has no values`,
        column,
      );
    }
    return profile;
  };

  return createStore<FilterPipelineState>((set, get) => {
    const record = <T>(result: Result<T>): Result<T> => {
      if (!result.ok) {
        logger.warn({ kind: result.error.kind, subject: result.error.subject }, result.error.message);
        set({ lastError: result.error });
      }
      return result;
    };

    return {
      filters: [],
      mask: fullMask(dataset),
      baselines: new Map(),
      nextOrder: 1,
      lastError: null,

      addFilter: (column) =>
        record(
          attempt(() => {
            const profile = profileFor(column);
            const { filters, nextOrder } = get();
            const spec: FilterSpec = Object.freeze({
              id: `filter-${nextOrder}`,
              column,
              kind: profile.kind,
              params: defaultParams(profile),
              order: nextOrder,
            });
            set({ ...derive([...filters, spec]), nextOrder: nextOrder + 1, lastError: null });
            logger.debug({ filterId: spec.id, column }, "filter added");
            return spec;
          }),
        ),

      removeFilter: (id) => {
        const { filters } = get();
        if (!filters.some((f) => f.id === id)) {
          logger.warn({ filterId: id }, "removeFilter: no such filter");
          return;
        }
        set({ ...derive(filters.filter((f) => f.id !== id)), lastError: null });
        logger.debug({ filterId: id }, "filter removed");
      },

      updateFilter: (id, params) =>
        record(
          attempt(() => {
            const { filters } = get();
            const current = filters.find((f) => f.id === id);
            if (!current) {
              throw new EngineError("UnknownFilter", `Unknown filter "${id}"`, id);
            }
            const validated = validateParams(profileFor(current.column), params);
            const updated: FilterSpec = Object.freeze({ ...current, params: validated });
            set({
              ...derive(filters.map((f) => (f.id === id ? updated : f))),
              lastError: null,
            });
            return updated;
          }),
        ),

      clearFilters: () => set({ ...derive([]), lastError: null }),

      currentMask: () => get().mask,

      baselineFor: (id) => get().baselines.get(id),
    };
  });
}
