/**
 * View binding for the shared selection broker.
 */

import { useStore } from "zustand";
import type { RowId } from "../types/dataset.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";

interface UseSelectionReturn {
  selection: ReadonlySet<RowId>;
  /** Replace the selection, dropping ids the dataset does not have. */
  select: (rowIds: Iterable<RowId>) => void;
  clear: () => void;
}

export function useSelection(): UseSelectionReturn {
  const session = useExplorerSession();
  const selection = useStore(session.selection, (state) => state.selection);
  return { selection, select: session.reportSelection, clear: session.clearSelection };
}
