/**
 * Every scatter view of the session, all sharing one selection.
 */

import { useStore } from "zustand";
import { useExplorerSession } from "../context/ExplorerContext.tsx";
import { ScatterPlot } from "./ScatterPlot.tsx";

export function ScatterPanel() {
  const { scatter } = useExplorerSession();
  const views = useStore(scatter, (state) => state.views);

  if (views.length === 0) {
    return (
      <p className="text-sm text-text-muted" data-testid="scatter-empty">
        Add a scatter plot from the sidebar.
      </p>
    );
  }

  return (
    <div className="flex flex-wrap gap-4" data-testid="scatter-panel">
      {views.map((view) => (
        <ScatterPlot key={view.id} viewId={view.id} />
      ))}
    </div>
  );
}
