/**
 * Selection summary: how many rows are selected, how many of those the
 * current filters hide, and a clear button.
 */

import { useMemo } from "react";
import { CircleX } from "lucide-react";
import { useStore } from "zustand";
import { visibleRowIds } from "../lib/dataset.ts";
import { hiddenSelection } from "../stores/selectionStore.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";
import { useSelection } from "../hooks/useSelection.ts";

export function SelectionBar() {
  const session = useExplorerSession();
  const { selection, clear } = useSelection();
  const mask = useStore(session.filters, (state) => state.mask);

  const hidden = useMemo(
    () => hiddenSelection(selection, visibleRowIds(session.dataset, mask)).size,
    [selection, session.dataset, mask],
  );

  if (selection.size === 0) return null;

  return (
    <div
      className="flex items-center gap-3 rounded-md bg-bg-secondary px-3 py-2 text-sm text-text-secondary"
      data-testid="selection-bar"
    >
      <span data-testid="selection-count">{selection.size} selected</span>
      {hidden > 0 && (
        <span className="text-text-muted" data-testid="selection-hidden">
          {hidden} hidden by filters
        </span>
      )}
      <button
        onClick={clear}
        className="ml-auto flex items-center gap-1 text-text-muted hover:text-text-primary"
        data-testid="clear-selection"
      >
        <CircleX className="h-4 w-4" />
        Clear
      </button>
    </div>
  );
}
