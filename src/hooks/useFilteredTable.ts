/**
 * View binding for the filtered data table, paged.
 */

import { useMemo } from "react";
import { useStore } from "zustand";
import type { CellValue, RowId } from "../types/dataset.ts";
import { TABLE_PAGE_SIZE } from "../lib/constants.ts";
import { columnNames } from "../lib/dataset.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";

export interface TableRow {
  rowId: RowId;
  cells: readonly CellValue[];
  selected: boolean;
}

interface UseFilteredTableReturn {
  columns: readonly string[];
  rows: readonly TableRow[];
  /** Rows passing every filter. */
  totalRows: number;
  pageCount: number;
  /** Clamped to the available pages. */
  page: number;
}

export function useFilteredTable(page: number, pageSize = TABLE_PAGE_SIZE): UseFilteredTableReturn {
  const session = useExplorerSession();
  const { dataset } = session;
  const mask = useStore(session.filters, (state) => state.mask);
  const selection = useStore(session.selection, (state) => state.selection);

  const visibleIndexes = useMemo(() => {
    const indexes: number[] = [];
    mask.values.forEach((keep, index) => {
      if (keep) indexes.push(index);
    });
    return indexes;
  }, [mask]);

  const pageCount = Math.max(1, Math.ceil(visibleIndexes.length / pageSize));
  const current = Math.min(Math.max(page, 0), pageCount - 1);

  const rows = useMemo(
    () =>
      visibleIndexes.slice(current * pageSize, (current + 1) * pageSize).map((index) => {
        const rowId = dataset.rowIds[index];
        return {
          rowId,
          cells: dataset.columns.map((c) => c.values[index]),
          selected: selection.has(rowId),
        };
      }),
    [dataset, visibleIndexes, current, pageSize, selection],
  );

  return {
    columns: columnNames(dataset),
    rows,
    totalRows: visibleIndexes.length,
    pageCount,
    page: current,
  };
}
