/**
 * Hook for loading the dataset and opening a session over it.
 */

import { useState, useCallback } from "react";
import { fetchDataset } from "../lib/api.ts";
import { createExplorerSession, type ExplorerSession } from "../stores/session.ts";

interface UseDatasetReturn {
  /** Fetch the dataset and open a session. Returns the session on success. */
  load: () => Promise<ExplorerSession | null>;
  /** Whether a fetch is in flight. */
  loading: boolean;
  /** Error message from the last failed load, if any. */
  error: string | null;
  /** Session over the most recently loaded dataset. */
  session: ExplorerSession | null;
}

export function useDataset(): UseDatasetReturn {
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [session, setSession] = useState<ExplorerSession | null>(null);

  const load = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      const next = createExplorerSession(await fetchDataset());
      setSession(next);
      return next;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : "Dataset request failed";
      setError(message);
      return null;
    } finally {
      setLoading(false);
    }
  }, []);

  return { load, loading, error, session };
}
