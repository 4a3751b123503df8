/**
 * Axios client for the dataset service.
 *
 * In development, Vite proxies /api to the data service.
 * In production, VITE_API_BASE_URL points to the deployed backend.
 */

import axios from "axios";
import { z } from "zod";
import type { Dataset } from "../types/dataset.ts";
import type { DatasetResponse } from "../types/api.ts";
import { datasetFromRows } from "./dataset.ts";

const apiClient = axios.create({
  baseURL: import.meta.env.VITE_API_BASE_URL ?? "",
  timeout: 30_000,
  headers: {
    "Content-Type": "application/json",
  },
});

const cellSchema = z.union([z.number(), z.string(), z.null()]);

export const datasetResponseSchema: z.ZodType<DatasetResponse> = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(z.array(cellSchema)),
    row_ids: z.array(z.union([z.number(), z.string()])).optional(),
  })
  .refine((body) => body.rows.every((row) => row.length === body.columns.length), {
    message: "every row must have one cell per column",
  })
  .refine((body) => body.row_ids === undefined || body.row_ids.length === body.rows.length, {
    message: "row_ids must have one entry per row",
  });

/** Validate a dataset payload and build the immutable snapshot. */
export function parseDatasetResponse(body: unknown): Dataset {
  const parsed = datasetResponseSchema.parse(body);
  return datasetFromRows(parsed.columns, parsed.rows, parsed.row_ids);
}

/** Fetch the session dataset. */
export async function fetchDataset(): Promise<Dataset> {
  const { data } = await apiClient.get<unknown>("/api/v1/dataset");
  return parseDatasetResponse(data);
}

export default apiClient;
