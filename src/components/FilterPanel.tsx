/**
 * Filter sidebar: pick a column, add a filter, edit the active ones.
 */

import { useState } from "react";
import { Plus } from "lucide-react";
import { filterableColumns } from "../lib/columnProfiler.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";
import { useFilterPipeline } from "../hooks/useFilterPipeline.ts";
import { FilterCard } from "./FilterCard.tsx";

export function FilterPanel() {
  const session = useExplorerSession();
  const columns = filterableColumns(session.profiles);
  const [column, setColumn] = useState(columns[0] ?? "");
  const filters = useFilterPipeline((state) => state.filters);
  const lastError = useFilterPipeline((state) => state.lastError);
  const visibleRows = useFilterPipeline((state) => state.mask.count);

  return (
    <div className="flex flex-col gap-3" data-testid="filter-panel">
      <div className="flex items-center gap-2">
        <select
          value={column}
          onChange={(e) => setColumn(e.target.value)}
          className="flex-1 rounded-md border border-bg-tertiary bg-bg-primary px-3 py-2 text-sm text-text-primary focus:border-accent focus:outline-none"
          data-testid="filter-column-select"
        >
          {columns.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
        <button
          onClick={() => session.addFilter(column)}
          disabled={!column}
          className="flex items-center gap-1 rounded-md bg-accent px-3 py-2 text-sm font-medium text-bg-primary hover:bg-accent-hover disabled:opacity-50"
          data-testid="add-filter-button"
        >
          <Plus className="h-4 w-4" />
          Add Filter
        </button>
      </div>

      {lastError && (
        <p className="text-sm text-danger" data-testid="filter-error">
          {lastError.message}
        </p>
      )}

      <p className="text-xs text-text-muted" data-testid="visible-row-count">
        {visibleRows} of {session.dataset.rowIds.length} rows
      </p>

      {filters.map((filter) => (
        <FilterCard key={filter.id} filter={filter} />
      ))}
    </div>
  );
}
