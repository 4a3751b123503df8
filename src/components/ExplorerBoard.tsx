/**
 * Main exploration workspace: filter and plot controls in the sidebar,
 * table and scatter plots in the main area.
 */

import { FilterPanel } from "./FilterPanel.tsx";
import { ScatterConfigForm } from "./ScatterConfigForm.tsx";
import { SelectionBar } from "./SelectionBar.tsx";
import { DataTable } from "./DataTable.tsx";
import { ScatterPanel } from "./ScatterPanel.tsx";

export function ExplorerBoard() {
  return (
    <div className="flex h-full" data-testid="explorer-board">
      {/* Sidebar */}
      <aside className="flex w-96 shrink-0 flex-col gap-6 overflow-y-auto border-r border-bg-tertiary bg-bg-secondary p-4">
        <section>
          <h2 className="mb-2 text-sm font-semibold uppercase text-text-secondary">Filters</h2>
          <FilterPanel />
        </section>
        <section>
          <h2 className="mb-2 text-sm font-semibold uppercase text-text-secondary">Scatter Plot</h2>
          <ScatterConfigForm />
        </section>
      </aside>

      {/* Main content */}
      <div className="flex min-w-0 flex-1 flex-col gap-4 overflow-y-auto p-4">
        <SelectionBar />
        <DataTable />
        <ScatterPanel />
      </div>
    </div>
  );
}
