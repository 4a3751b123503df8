/**
 * Zustand store for the shared row selection.
 *
 * One broker per session, injected into every view. The selection is
 * replaced wholesale; filter changes never touch it.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { RowId } from "../types/dataset.ts";
import type { EngineLogger } from "../lib/logger.ts";

export interface SelectionState {
  selection: ReadonlySet<RowId>;
  /** Incremented on every replacement, including no-op ones. */
  version: number;

  replaceSelection: (rowIds: Iterable<RowId>) => void;
  clearSelection: () => void;
  currentSelection: () => ReadonlySet<RowId>;
}

export type SelectionBroker = StoreApi<SelectionState>;

export function createSelectionBroker(logger: EngineLogger): SelectionBroker {
  return createStore<SelectionState>((set, get) => ({
    selection: new Set(),
    version: 0,

    replaceSelection: (rowIds) => {
      const selection: ReadonlySet<RowId> = new Set(rowIds);
      set((state) => ({ selection, version: state.version + 1 }));
      logger.debug({ size: selection.size }, "selection replaced");
    },

    clearSelection: () => get().replaceSelection([]),

    currentSelection: () => get().selection,
  }));
}

/** Selected rows the view's filters hide. Kept, rendered dimmed. */
export function hiddenSelection(
  selection: ReadonlySet<RowId>,
  visibleRows: ReadonlySet<RowId>,
): ReadonlySet<RowId> {
  const hidden = new Set<RowId>();
  for (const id of selection) if (!visibleRows.has(id)) hidden.add(id);
  return hidden;
}
