/**
 * Baseline-over-kept bars for one filter.
 *
 * The full bar is the column under every other filter; the filled part is
 * what this filter keeps.
 */

import type { Baseline } from "../types/filters.ts";
import { formatCell } from "../lib/constants.ts";

interface DistributionStripProps {
  baseline: Baseline;
}

interface Bar {
  label: string;
  baseline: number;
  kept: number;
}

function toBars(baseline: Baseline): Bar[] {
  const { distribution } = baseline;
  if (distribution.kind === "categorical") {
    return distribution.bins.map((b) => ({
      label: String(b.value),
      baseline: b.baseline,
      kept: b.kept,
    }));
  }
  return distribution.bins.map((b) => ({
    label: `${formatCell(b.start)}–${formatCell(b.end)}`,
    baseline: b.baseline,
    kept: b.kept,
  }));
}

export function DistributionStrip({ baseline }: DistributionStripProps) {
  const bars = toBars(baseline);
  const peak = Math.max(1, ...bars.map((b) => b.baseline));

  return (
    <div data-testid={`distribution-${baseline.filterId}`}>
      <div className="flex h-16 items-end gap-px">
        {bars.map((bar, index) => (
          <div
            key={index}
            className="relative flex-1 rounded-t-sm bg-bg-tertiary"
            style={{ height: `${(bar.baseline / peak) * 100}%` }}
            title={`${bar.label}: ${bar.kept} of ${bar.baseline}`}
          >
            <div
              className="absolute bottom-0 w-full rounded-t-sm bg-accent/70"
              style={{ height: bar.baseline > 0 ? `${(bar.kept / bar.baseline) * 100}%` : "0%" }}
            />
          </div>
        ))}
      </div>
      <p className="mt-1 text-xs text-text-muted" data-testid={`distribution-count-${baseline.filterId}`}>
        {baseline.keptCount} of {baseline.mask.count} rows kept
      </p>
    </div>
  );
}
