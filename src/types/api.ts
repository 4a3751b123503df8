/**
 * Wire types for the dataset service.
 */

import type { CellValue } from "./dataset.ts";

/** `GET /api/v1/dataset` response body. Rows are in `columns` order. */
export interface DatasetResponse {
  columns: string[];
  rows: CellValue[][];
  /** Stable row identities; positional ids are assigned when absent. */
  row_ids?: (number | string)[];
}
