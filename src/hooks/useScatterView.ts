/**
 * View binding for one scatter plot: re-projects on filter, selection or
 * spec changes.
 */

import { useMemo } from "react";
import { useStore } from "zustand";
import type { ScatterProjection, ScatterView } from "../types/scatter.ts";
import { projectScatter } from "../lib/scatter.ts";
import { useExplorerSession } from "../context/ExplorerContext.tsx";

interface UseScatterViewReturn {
  view: ScatterView | undefined;
  projection: ScatterProjection | null;
}

export function useScatterView(viewId: string): UseScatterViewReturn {
  const session = useExplorerSession();
  const view = useStore(session.scatter, (state) => state.views.find((v) => v.id === viewId));
  const mask = useStore(session.filters, (state) => state.mask);
  const selection = useStore(session.selection, (state) => state.selection);

  const projection = useMemo(
    () =>
      view ? projectScatter(session.dataset, view.spec, session.profiles, mask, selection) : null,
    [session, view, mask, selection],
  );

  return { view, projection };
}
