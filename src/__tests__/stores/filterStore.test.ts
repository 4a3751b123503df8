import { describe, it, expect, beforeEach } from "vitest";
import { createFilterPipeline, type FilterPipeline } from "../../stores/filterStore.ts";
import { classify } from "../../lib/columnProfiler.ts";
import { computeMask } from "../../lib/mask.ts";
import type { FilterSpec } from "../../types/filters.ts";
import { smallDataset, spyLogger, trueIndexes } from "../fixtures.ts";

const dataset = smallDataset();
const { profiles } = classify(dataset);

let pipeline: FilterPipeline;
let logger: ReturnType<typeof spyLogger>;

beforeEach(() => {
  logger = spyLogger();
  pipeline = createFilterPipeline({ dataset, profiles, logger });
});

/** Add a filter and return its id, failing the test if it is rejected. */
function add(column: string): string {
  const result = pipeline.getState().addFilter(column);
  if (!result.ok) throw result.error;
  return result.value.id;
}

describe("filterStore", () => {
  it("starts with no filters and a full mask", () => {
    const state = pipeline.getState();
    expect(state.filters).toHaveLength(0);
    expect(state.mask.count).toBe(10);
    expect(state.baselines.size).toBe(0);
    expect(state.lastError).toBeNull();
  });

  it("addFilter appends a spec with default parameters", () => {
    const result = pipeline.getState().addFilter("score");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      id: "filter-1",
      column: "score",
      kind: "numeric",
      params: { kind: "numeric", lower: 5, upper: 70 },
      order: 1,
    });
    expect(pipeline.getState().mask.count).toBe(10);
    expect(pipeline.getState().baselineFor("filter-1")?.mask.count).toBe(10);
  });

  it("addFilter rejects unknown and unclassifiable columns", () => {
    const unknown = pipeline.getState().addFilter("nope");
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) expect(unknown.error.kind).toBe("UnknownColumn");

    const empty = pipeline.getState().addFilter("empty");
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error.kind).toBe("InvalidColumn");

    expect(pipeline.getState().filters).toHaveLength(0);
    expect(pipeline.getState().lastError?.kind).toBe("InvalidColumn");
  });

  it("updateFilter replaces parameters in place and recomputes the mask", () => {
    const first = add("score");
    const second = add("group");
    const result = pipeline
      .getState()
      .updateFilter(first, { kind: "numeric", lower: 20, upper: 60 });
    expect(result.ok).toBe(true);

    const state = pipeline.getState();
    expect(state.filters.map((f) => [f.id, f.order])).toEqual([
      [first, 1],
      [second, 2],
    ]);
    expect(trueIndexes(state.mask.values)).toEqual([3, 4, 5, 6, 7]);
  });

  it("an invalid pattern leaves the previous pattern in effect", () => {
    const id = add("name");
    pipeline.getState().updateFilter(id, { kind: "text", pattern: "^[a-d]" });
    const before = pipeline.getState().mask;

    const result = pipeline.getState().updateFilter(id, { kind: "text", pattern: "[" });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("InvalidPattern");

    const state = pipeline.getState();
    expect(state.mask).toBe(before);
    expect(trueIndexes(state.mask.values)).toEqual([0, 1, 2, 3]);
    expect(state.filters[0].params).toEqual({ kind: "text", pattern: "^[a-d]" });
    expect(state.lastError?.kind).toBe("InvalidPattern");
  });

  it("out-of-domain parameters are rejected without changing state", () => {
    const id = add("group");
    const result = pipeline.getState().updateFilter(id, { kind: "categorical", allowed: ["z"] });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("OutOfDomainParameter");
    expect(pipeline.getState().filters[0].params).toEqual({
      kind: "categorical",
      allowed: ["a", "b", "c"],
    });
  });

  it("a successful command clears lastError", () => {
    pipeline.getState().addFilter("nope");
    expect(pipeline.getState().lastError).not.toBeNull();
    add("score");
    expect(pipeline.getState().lastError).toBeNull();
  });

  it("updateFilter on an unknown id fails with UnknownFilter", () => {
    const result = pipeline.getState().updateFilter("filter-99", { kind: "text", pattern: "" });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("UnknownFilter");
  });

  it("removeFilter on an unknown id is a no-op with a warning", () => {
    add("score");
    const before = pipeline.getState();
    pipeline.getState().removeFilter("filter-99");
    expect(pipeline.getState()).toBe(before);
    expect(logger.warn).toHaveBeenCalledWith({ filterId: "filter-99" }, "removeFilter: no such filter");
  });

  it("removeFilter keeps the order of the remaining filters", () => {
    const a = add("score");
    const b = add("group");
    const c = add("name");
    pipeline.getState().removeFilter(b);
    expect(pipeline.getState().filters.map((f) => [f.id, f.order])).toEqual([
      [a, 1],
      [c, 3],
    ]);
    expect(pipeline.getState().baselineFor(b)).toBeUndefined();
  });

  it("re-adding a removed filter yields the same mask but a fresh id", () => {
    const score = add("score");
    const group = add("group");
    pipeline.getState().updateFilter(group, { kind: "categorical", allowed: ["a"] });
    const before = pipeline.getState().mask.values;

    pipeline.getState().removeFilter(group);
    const again = add("group");
    pipeline.getState().updateFilter(again, { kind: "categorical", allowed: ["a"] });

    expect(pipeline.getState().mask.values).toEqual(before);
    expect(again).not.toBe(group);
    expect(pipeline.getState().filters.map((f) => f.order)).toEqual([1, 3]);
    expect(score).toBe("filter-1");
  });

  it("mask equals the AND of the active filters regardless of insertion order", () => {
    const forward = createFilterPipeline({ dataset, profiles, logger });
    const backward = createFilterPipeline({ dataset, profiles, logger });
    const edits = {
      score: { kind: "numeric", lower: 20, upper: 60 },
      group: { kind: "categorical", allowed: ["a", "b"] },
      name: { kind: "text", pattern: "e" },
    } as const;

    for (const store of [forward, backward]) {
      const columns: (keyof typeof edits)[] =
        store === forward ? ["score", "group", "name"] : ["name", "group", "score"];
      for (const column of columns) {
        const result = store.getState().addFilter(column);
        if (!result.ok) throw result.error;
        store.getState().updateFilter(result.value.id, edits[column]);
      }
    }

    expect(forward.getState().mask.values).toEqual(backward.getState().mask.values);
    expect(trueIndexes(forward.getState().mask.values)).toEqual([4, 7]);
    expect(forward.getState().mask.values).toEqual(
      computeMask(dataset, forward.getState().filters).values,
    );
  });

  it("each baseline excludes exactly its own filter", () => {
    const ids = ["score", "group", "name"].map(add);
    pipeline.getState().updateFilter(ids[0], { kind: "numeric", lower: 20, upper: 60 });
    pipeline.getState().updateFilter(ids[1], { kind: "categorical", allowed: ["a", "b"] });
    pipeline.getState().updateFilter(ids[2], { kind: "text", pattern: "e" });

    const { filters } = pipeline.getState();
    for (const id of ids) {
      const forcedTrue = filters.map((f): FilterSpec =>
        f.id === id ? { ...f, kind: "text", column: "name", params: { kind: "text", pattern: "" } } : f,
      );
      expect(pipeline.getState().baselineFor(id)?.mask.values).toEqual(
        computeMask(dataset, forcedTrue).values,
      );
    }
  });

  it("notifies subscribers once per mutation with consistent state", () => {
    const seen: number[] = [];
    pipeline.subscribe((state) => {
      expect(state.mask.values).toEqual(computeMask(dataset, state.filters).values);
      seen.push(state.filters.length);
    });
    const id = add("score");
    pipeline.getState().updateFilter(id, { kind: "numeric", lower: 30, upper: 40 });
    pipeline.getState().removeFilter(id);
    expect(seen).toEqual([1, 1, 0]);
  });

  it("clearFilters removes everything but keeps the order counter", () => {
    add("score");
    add("group");
    pipeline.getState().clearFilters();
    expect(pipeline.getState().filters).toHaveLength(0);
    expect(pipeline.getState().mask.count).toBe(10);
    expect(add("name")).toBe("filter-3");
  });

  it("allows several filters on the same column", () => {
    const low = add("score");
    const high = add("score");
    pipeline.getState().updateFilter(low, { kind: "numeric", lower: 5, upper: 40 });
    pipeline.getState().updateFilter(high, { kind: "numeric", lower: 25, upper: 70 });
    expect(trueIndexes(pipeline.getState().mask.values)).toEqual([3, 4, 5]);
  });

  it("an empty category selection keeps every row", () => {
    const id = add("group");
    const result = pipeline.getState().updateFilter(id, { kind: "categorical", allowed: [] });
    expect(result.ok).toBe(true);
    expect(pipeline.getState().currentMask().count).toBe(10);
    expect(pipeline.getState().baselineFor(id)?.keptCount).toBe(10);
  });
});
