/**
 * One exploration session: a dataset, its column profiles, and the three
 * stores views subscribe to.
 *
 * The filter and selection stores are independent channels. `subscribe`
 * merges them into one snapshot stream for consumers that want both.
 */

import type { ColumnProfile, Dataset, RowId } from "../types/dataset.ts";
import type { EngineSnapshot, FilterId, FilterParams, FilterSpec } from "../types/filters.ts";
import type { ScatterPlotInput, ScatterView } from "../types/scatter.ts";
import { classify } from "../lib/columnProfiler.ts";
import type { EngineError, Result } from "../lib/errors.ts";
import { moduleLogger, type EngineLogger } from "../lib/logger.ts";
import { createFilterPipeline, type FilterPipeline } from "./filterStore.ts";
import { createScatterStore, type ScatterStore } from "./scatterStore.ts";
import { createSelectionBroker, type SelectionBroker } from "./selectionStore.ts";

export interface ExplorerSession {
  dataset: Dataset;
  profiles: ReadonlyMap<string, ColumnProfile>;
  /** Columns the profiler rejected. */
  invalidColumns: readonly EngineError[];
  filters: FilterPipeline;
  selection: SelectionBroker;
  scatter: ScatterStore;

  addFilter: (column: string) => Result<FilterSpec>;
  removeFilter: (id: FilterId) => void;
  updateFilter: (id: FilterId, params: FilterParams) => Result<FilterSpec>;
  configureScatter: (input: ScatterPlotInput) => Result<ScatterView>;
  /** Replace the selection. Ids not in the dataset are dropped. */
  reportSelection: (rowIds: Iterable<RowId>) => void;
  clearSelection: () => void;

  snapshot: () => EngineSnapshot;
  /** Called after every filter or selection change. Returns an unsubscribe. */
  subscribe: (listener: (snapshot: EngineSnapshot) => void) => () => void;
}

export interface SessionOptions {
  logger?: EngineLogger;
}

export function createExplorerSession(
  dataset: Dataset,
  options: SessionOptions = {},
): ExplorerSession {
  const logger = options.logger ?? moduleLogger("session");
  const { profiles, invalid } = classify(dataset);
  for (const error of invalid) {
    logger.warn({ column: error.subject }, error.message);
  }
  logger.info(
    { rows: dataset.rowIds.length, columns: dataset.columns.length, excluded: invalid.length },
    "session created",
  );

  const filters = createFilterPipeline({ dataset, profiles, logger });
  const selection = createSelectionBroker(logger);
  const scatter = createScatterStore({ dataset, profiles, logger });
  const knownRows = new Set<RowId>(dataset.rowIds);

  const snapshot = (): EngineSnapshot => {
    const { mask, baselines } = filters.getState();
    return {
      currentMask: mask,
      perFilterBaselines: baselines,
      currentSelection: selection.getState().selection,
    };
  };

  return {
    dataset,
    profiles,
    invalidColumns: invalid,
    filters,
    selection,
    scatter,

    addFilter: (column) => filters.getState().addFilter(column),
    removeFilter: (id) => filters.getState().removeFilter(id),
    updateFilter: (id, params) => filters.getState().updateFilter(id, params),
    configureScatter: (input) => scatter.getState().addView(input),

    reportSelection: (rowIds) => {
      const accepted: RowId[] = [];
      let dropped = 0;
      for (const id of rowIds) {
        if (knownRows.has(id)) accepted.push(id);
        else dropped++;
      }
      if (dropped > 0) {
        logger.warn({ dropped }, "reportSelection: ignoring unknown row ids");
      }
      selection.getState().replaceSelection(accepted);
    },

    clearSelection: () => selection.getState().clearSelection(),

    snapshot,

    subscribe: (listener) => {
      const emit = () => listener(snapshot());
      const stopFilters = filters.subscribe((state, prev) => {
        if (state.mask !== prev.mask || state.baselines !== prev.baselines) emit();
      });
      const stopSelection = selection.subscribe(emit);
      return () => {
        stopFilters();
        stopSelection();
      };
    },
  };
}
