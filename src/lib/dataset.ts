/**
 * Dataset construction and lookup helpers.
 */

import type { CellValue, Dataset, DatasetColumn, RowId } from "../types/dataset.ts";
import type { RowMask } from "../types/filters.ts";

/** `null`, `NaN` and the empty string are missing. */
export function isMissing(value: CellValue): boolean {
  return value === null || value === "" || (typeof value === "number" && Number.isNaN(value));
}

/**
 * Build a dataset from columns. Row ids default to positions.
 * Throws on ragged columns, duplicate column names or duplicate row ids.
 */
export function createDataset(columns: DatasetColumn[], rowIds?: readonly RowId[]): Dataset {
  const rowCount = columns.length > 0 ? columns[0].values.length : (rowIds?.length ?? 0);

  const names = new Set<string>();
  for (const column of columns) {
    if (names.has(column.name)) {
      throw new Error(`Duplicate column name: "${column.name}"`);
    }
    names.add(column.name);
    if (column.values.length !== rowCount) {
      throw new Error(
        `Column "${column.name}" has ${column.values.length} values, expected ${rowCount}`,
      );
    }
  }

  const ids = rowIds ?? Array.from({ length: rowCount }, (_, i) => i);
  if (ids.length !== rowCount) {
    throw new Error(`Expected ${rowCount} row ids, got ${ids.length}`);
  }
  if (new Set(ids).size !== ids.length) {
    throw new Error("Row ids must be unique");
  }

  return Object.freeze({
    rowIds: Object.freeze([...ids]),
    columns: Object.freeze(
      columns.map((c) => Object.freeze({ name: c.name, values: Object.freeze([...c.values]) })),
    ),
  });
}

/** Build a dataset from row-major records, in `columnNames` order. */
export function datasetFromRows(
  columnNames: readonly string[],
  rows: readonly (readonly CellValue[])[],
  rowIds?: readonly RowId[],
): Dataset {
  const columns = columnNames.map((name, index) => ({
    name,
    values: rows.map((row, rowIndex) => {
      if (row.length !== columnNames.length) {
        throw new Error(
          `Row ${rowIndex} has ${row.length} cells, expected ${columnNames.length}`,
        );
      }
      return row[index];
    }),
  }));
  return createDataset(columns, rowIds ?? Array.from({ length: rows.length }, (_, i) => i));
}

export function getColumn(dataset: Dataset, name: string): DatasetColumn | undefined {
  return dataset.columns.find((c) => c.name === name);
}

export function columnNames(dataset: Dataset): string[] {
  return dataset.columns.map((c) => c.name);
}

/** Row ids the mask lets through. */
export function visibleRowIds(dataset: Dataset, mask: RowMask): ReadonlySet<RowId> {
  const visible = new Set<RowId>();
  mask.values.forEach((keep, index) => {
    if (keep) visible.add(dataset.rowIds[index]);
  });
  return visible;
}
