/**
 * Shared datasets for engine and view tests.
 */

import { createDataset } from "../lib/dataset.ts";
import type { Dataset } from "../types/dataset.ts";
import type { EngineLogger } from "../lib/logger.ts";
import { vi } from "vitest";
import { EngineError } from "../lib/errors.ts";

/**
 * Ten rows:
 *   score: 10 distinct numbers (numeric)
 *   group: a/b/c (categorical)
 *   name : 10 distinct words (text)
 *   empty: all missing (unclassifiable)
 */
export function smallDataset(): Dataset {
  return createDataset([
    { name: "score", values: [5, 12, 18, 25, 31, 40, 47, 55, 62, 70] },
    { name: "group", values: ["a", "b", "a", "c", "b", "a", "c", "b", "a", "c"] },
    {
      name: "name",
      values: [
        "alpha",
        "bravo",
        "charlie",
        "delta",
        "echo",
        "foxtrot",
        "golf",
        "hotel",
        "india",
        "juliet",
      ],
    },
    { name: "empty", values: [null, null, null, null, null, null, null, null, null, null] },
  ]);
}

export const CITIES = ["NYC", "LA", "Chicago", "Houston", "Phoenix", "Boston", "Seattle", "Denver"];

/** 1000 rows: `age` cycles 18..80, `city` cycles through 8 cities. */
export function peopleDataset(): Dataset {
  const ids = Array.from({ length: 1000 }, (_, i) => i);
  return createDataset([
    { name: "age", values: ids.map((i) => 18 + (i % 63)) },
    { name: "city", values: ids.map((i) => CITIES[i % 8]) },
  ]);
}

/** Logger whose methods are spies. */
export function spyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  } satisfies EngineLogger;
}

/** Indexes of `true` entries. */
export function trueIndexes(values: readonly boolean[]): number[] {
  return values.flatMap((v, i) => (v ? [i] : []));
}

/** Run `fn` and return the EngineError it throws. */
export function catchEngineError(fn: () => unknown): EngineError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof EngineError) return err;
    throw err;
  }
  throw new Error("expected an EngineError");
}
