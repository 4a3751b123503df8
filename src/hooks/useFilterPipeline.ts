/**
 * View bindings for the filter pipeline of the injected session.
 */

import { useStore } from "zustand";
import type { Baseline, FilterId } from "../types/filters.ts";
import type { FilterPipelineState } from "../stores/filterStore.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";

/** Subscribe to a slice of the filter pipeline. Selectors must return stable references. */
export function useFilterPipeline<T>(selector: (state: FilterPipelineState) => T): T {
  const { filters } = useExplorerSession();
  return useStore(filters, selector);
}

/** Baseline of one filter; undefined once the filter is removed. */
export function useFilterBaseline(id: FilterId): Baseline | undefined {
  return useFilterPipeline((state) => state.baselines.get(id));
}
