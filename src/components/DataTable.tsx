/**
 * Paged table of the rows passing every filter. Selected rows are marked.
 */

import { useState } from "react";
import { ChevronLeft, ChevronRight } from "lucide-react";
import { formatCell } from "../lib/constants.ts";
import { useFilteredTable } from "../hooks/useFilteredTable.ts";

export function DataTable() {
  const [page, setPage] = useState(0);
  const { columns, rows, totalRows, pageCount, page: current } = useFilteredTable(page);

  return (
    <div className="flex flex-col gap-2" data-testid="data-table">
      <div className="overflow-x-auto">
        <table className="w-full text-left text-sm">
          <thead>
            <tr className="border-b border-bg-tertiary text-text-secondary">
              {columns.map((name) => (
                <th key={name} className="px-2 py-1 font-medium">
                  {name}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => (
              <tr
                key={String(row.rowId)}
                className={row.selected ? "bg-accent/10 text-text-primary" : "text-text-secondary"}
                data-testid={`table-row-${String(row.rowId)}`}
                data-selected={row.selected}
              >
                {row.cells.map((cell, index) => (
                  <td key={columns[index]} className="px-2 py-1">
                    {formatCell(cell)}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div className="flex items-center justify-between text-xs text-text-muted">
        <span data-testid="table-total">{totalRows} rows</span>
        <div className="flex items-center gap-2">
          <button
            onClick={() => setPage(current - 1)}
            disabled={current === 0}
            aria-label="Previous page"
            className="rounded p-1 hover:text-text-primary disabled:opacity-50"
          >
            <ChevronLeft className="h-4 w-4" />
          </button>
          <span data-testid="table-page">
            {current + 1} / {pageCount}
          </span>
          <button
            onClick={() => setPage(current + 1)}
            disabled={current >= pageCount - 1}
            aria-label="Next page"
            className="rounded p-1 hover:text-text-primary disabled:opacity-50"
          >
            <ChevronRight className="h-4 w-4" />
          </button>
        </div>
      </div>
    </div>
  );
}
