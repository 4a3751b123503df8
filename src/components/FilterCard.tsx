/**
 * One active filter: kind-specific control, remove button and its
 * distribution strip.
 */

import { useState, useCallback, type FormEvent } from "react";
import { X } from "lucide-react";
import type { CategoryValue, ColumnProfile } from "../types/dataset.ts";
import type { FilterSpec } from "../types/filters.ts";
import { KIND_LABELS, formatCell } from "../lib/constants.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";
import { useFilterBaseline } from "../hooks/useFilterPipeline.ts";
import { DistributionStrip } from "./DistributionStrip.tsx";

interface FilterCardProps {
  filter: FilterSpec;
}

const inputClass =
  "w-full rounded-md border border-bg-tertiary bg-bg-primary px-2 py-1 text-sm text-text-primary focus:border-accent focus:outline-none";

function RangeControl({ filter }: FilterCardProps) {
  const { updateFilter } = useExplorerSession();
  const params = filter.params.kind === "numeric" ? filter.params : null;
  const [lower, setLower] = useState(String(params?.lower ?? ""));
  const [upper, setUpper] = useState(String(params?.upper ?? ""));

  const apply = useCallback(
    (e?: FormEvent) => {
      e?.preventDefault();
      const result = updateFilter(filter.id, {
        kind: "numeric",
        lower: Number(lower),
        upper: Number(upper),
      });
      // Show the bounds still in effect after a rejected edit.
      if (!result.ok && params) {
        setLower(String(params.lower));
        setUpper(String(params.upper));
      }
    },
    [updateFilter, filter.id, lower, upper, params],
  );

  return (
    <form onSubmit={apply} className="flex items-center gap-2">
      <input
        type="number"
        value={lower}
        onChange={(e) => setLower(e.target.value)}
        onBlur={() => apply()}
        className={inputClass}
        aria-label={`${filter.column} lower bound`}
        data-testid={`filter-lower-${filter.id}`}
      />
      <span className="text-text-muted">–</span>
      <input
        type="number"
        value={upper}
        onChange={(e) => setUpper(e.target.value)}
        onBlur={() => apply()}
        className={inputClass}
        aria-label={`${filter.column} upper bound`}
        data-testid={`filter-upper-${filter.id}`}
      />
    </form>
  );
}

function CategoryControl({
  filter,
  categories,
}: FilterCardProps & { categories: readonly CategoryValue[] }) {
  const { updateFilter } = useExplorerSession();
  const allowed = filter.params.kind === "categorical" ? filter.params.allowed : [];

  const toggle = (value: CategoryValue) => {
    const next = allowed.includes(value)
      ? allowed.filter((v) => v !== value)
      : [...allowed, value];
    updateFilter(filter.id, { kind: "categorical", allowed: next });
  };

  return (
    <div className="flex flex-wrap gap-2">
      {categories.map((value) => (
        <label key={String(value)} className="flex items-center gap-1 text-sm text-text-secondary">
          <input
            type="checkbox"
            checked={allowed.includes(value)}
            onChange={() => toggle(value)}
            data-testid={`filter-option-${filter.id}-${String(value)}`}
          />
          {formatCell(value)}
        </label>
      ))}
    </div>
  );
}

function PatternControl({ filter }: FilterCardProps) {
  const { updateFilter } = useExplorerSession();
  const [pattern, setPattern] = useState(
    filter.params.kind === "text" ? filter.params.pattern : "",
  );
  const [invalid, setInvalid] = useState(false);

  return (
    <input
      type="text"
      value={pattern}
      onChange={(e) => {
        setPattern(e.target.value);
        // A rejected pattern leaves the previous one in effect.
        setInvalid(!updateFilter(filter.id, { kind: "text", pattern: e.target.value }).ok);
      }}
      placeholder="Regex pattern..."
      className={`${inputClass} ${invalid ? "border-danger" : ""}`}
      aria-invalid={invalid}
      data-testid={`filter-pattern-${filter.id}`}
    />
  );
}

function FilterControl({ filter, profile }: FilterCardProps & { profile: ColumnProfile }) {
  switch (profile.kind) {
    case "numeric":
      return <RangeControl filter={filter} />;
    case "categorical":
      return <CategoryControl filter={filter} categories={profile.categories} />;
    case "text":
      return <PatternControl filter={filter} />;
  }
}

export function FilterCard({ filter }: FilterCardProps) {
  const { profiles, removeFilter } = useExplorerSession();
  const baseline = useFilterBaseline(filter.id);
  const profile = profiles.get(filter.column);

  return (
    <div
      className="flex flex-col gap-2 rounded-lg border border-bg-tertiary bg-bg-primary p-3"
      data-testid={`filter-card-${filter.id}`}
    >
      <div className="flex items-center justify-between">
        <div className="flex items-center gap-2">
          <span className="text-sm font-medium text-text-primary">{filter.column}</span>
          <span className="rounded bg-bg-tertiary px-2 py-0.5 text-xs text-text-muted">
            {KIND_LABELS[filter.kind]}
          </span>
        </div>
        <button
          onClick={() => removeFilter(filter.id)}
          className="rounded p-1 text-text-muted hover:text-text-primary"
          aria-label={`Remove ${filter.column} filter`}
          data-testid={`remove-filter-${filter.id}`}
        >
          <X className="h-4 w-4" />
        </button>
      </div>

      {profile && <FilterControl filter={filter} profile={profile} />}
      {baseline && <DistributionStrip baseline={baseline} />}
    </div>
  );
}
