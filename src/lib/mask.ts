/**
 * Row mask and per-filter baseline computation.
 *
 * Every filter is evaluated once per row, in insertion order. A row sits in
 * the baseline of filter F when every other filter keeps it, i.e. it fails
 * no filter, or F is the only one it fails.
 */

import type { ColumnProfile, Dataset } from "../types/dataset.ts";
import type {
  Baseline,
  CategoryBin,
  Distribution,
  FilterId,
  FilterSpec,
  HistogramBin,
  RowMask,
} from "../types/filters.ts";
import { NUMERIC_BIN_COUNT, TEXT_LENGTH_BIN_COUNT } from "./constants.ts";
import { getColumn, isMissing } from "./dataset.ts";
import { compilePredicate } from "./predicates.ts";

/** Per-filter pass flags, in filter order. */
export interface FilterEvaluation {
  filters: readonly FilterSpec[];
  passes: readonly (readonly boolean[])[];
  /** Number of filters each row fails. */
  failures: readonly number[];
}

export function toMask(values: boolean[]): RowMask {
  let count = 0;
  for (const v of values) if (v) count++;
  return Object.freeze({ values: Object.freeze(values), count });
}

/** Mask that keeps every row. */
export function fullMask(dataset: Dataset): RowMask {
  return toMask(dataset.rowIds.map(() => true));
}

/** Evaluate each filter against every row. Filters are sorted by `order` first. */
export function evaluateFilters(dataset: Dataset, specs: readonly FilterSpec[]): FilterEvaluation {
  const filters = [...specs].sort((a, b) => a.order - b.order);
  const rowCount = dataset.rowIds.length;
  const failures = new Array<number>(rowCount).fill(0);

  const passes = filters.map((spec) => {
    const column = getColumn(dataset, spec.column);
    if (!column) throw new Error(`Filter ${spec.id} references missing column "${spec.column}"`);
    const predicate = compilePredicate(spec.params);
    return column.values.map((value, row) => {
      const keep = predicate(value);
      if (!keep) failures[row]++;
      return keep;
    });
  });

  return { filters, passes, failures };
}

/** AND of every filter. */
export function maskFromEvaluation(evaluation: FilterEvaluation): RowMask {
  return toMask(evaluation.failures.map((f) => f === 0));
}

/** AND of every filter except the one at `index`. */
export function maskExcluding(evaluation: FilterEvaluation, index: number): RowMask {
  const own = evaluation.passes[index];
  return toMask(evaluation.failures.map((f, row) => f === 0 || (f === 1 && !own[row])));
}

/** Convenience: mask of `specs`, optionally leaving one filter out. */
export function computeMask(
  dataset: Dataset,
  specs: readonly FilterSpec[],
  excludeId?: FilterId,
): RowMask {
  const remaining = excludeId === undefined ? specs : specs.filter((s) => s.id !== excludeId);
  return maskFromEvaluation(evaluateFilters(dataset, remaining));
}

interface BinScale {
  lo: number;
  width: number;
  count: number;
}

/** Equal-width bins over [min, max]; a degenerate domain widens to ±0.5. */
function binScale(min: number, max: number, count: number): BinScale {
  const lo = min === max ? min - 0.5 : min;
  const hi = min === max ? max + 0.5 : max;
  return { lo, width: (hi - lo) / count, count };
}

function binIndex(scale: BinScale, value: number): number {
  const index = Math.floor((value - scale.lo) / scale.width);
  return Math.min(Math.max(index, 0), scale.count - 1);
}

function emptyHistogram(scale: BinScale): HistogramBin[] {
  return Array.from({ length: scale.count }, (_, i) => ({
    start: scale.lo + i * scale.width,
    end: scale.lo + (i + 1) * scale.width,
    baseline: 0,
    kept: 0,
  }));
}

/**
 * Distribution of the filter's column over the baseline rows.
 * `kept` counts baseline rows the filter itself passes.
 */
export function buildDistribution(
  dataset: Dataset,
  profile: ColumnProfile,
  baseline: RowMask,
  own: readonly boolean[],
): Distribution {
  const column = getColumn(dataset, profile.name);
  const values = column ? column.values : [];

  switch (profile.kind) {
    case "numeric": {
      const scale = binScale(profile.min, profile.max, NUMERIC_BIN_COUNT);
      const bins = emptyHistogram(scale);
      values.forEach((value, row) => {
        if (!baseline.values[row] || typeof value !== "number" || Number.isNaN(value)) return;
        const bin = bins[binIndex(scale, value)];
        bin.baseline++;
        if (own[row]) bin.kept++;
      });
      return { kind: "numeric", bins };
    }
    case "categorical": {
      const bins: CategoryBin[] = profile.categories.map((value) => ({
        value,
        baseline: 0,
        kept: 0,
      }));
      const byValue = new Map(bins.map((bin) => [bin.value, bin]));
      values.forEach((value, row) => {
        if (!baseline.values[row] || value === null) return;
        const bin = byValue.get(value);
        if (!bin) return;
        bin.baseline++;
        if (own[row]) bin.kept++;
      });
      return { kind: "categorical", bins };
    }
    case "text": {
      const scale = binScale(profile.minLength, profile.maxLength, TEXT_LENGTH_BIN_COUNT);
      const bins = emptyHistogram(scale);
      values.forEach((value, row) => {
        if (!baseline.values[row] || value === null || isMissing(value)) return;
        const bin = bins[binIndex(scale, String(value).length)];
        bin.baseline++;
        if (own[row]) bin.kept++;
      });
      return { kind: "text", bins };
    }
  }
}

/** Baseline for every evaluated filter, keyed by filter id. */
export function computeBaselines(
  dataset: Dataset,
  profiles: ReadonlyMap<string, ColumnProfile>,
  evaluation: FilterEvaluation,
): ReadonlyMap<FilterId, Baseline> {
  const baselines = new Map<FilterId, Baseline>();

  evaluation.filters.forEach((spec, index) => {
    const profile = profiles.get(spec.column);
    if (!profile) return;
    const own = evaluation.passes[index];
    const mask = maskExcluding(evaluation, index);
    let keptCount = 0;
    mask.values.forEach((inBaseline, row) => {
      if (inBaseline && own[row]) keptCount++;
    });
    baselines.set(
      spec.id,
      Object.freeze({
        filterId: spec.id,
        column: spec.column,
        mask,
        keptCount,
        distribution: buildDistribution(dataset, profile, mask, own),
      }),
    );
  });

  return baselines;
}
