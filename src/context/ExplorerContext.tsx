/**
 * Injects one exploration session into the view tree.
 */

import { createContext, useContext, type ReactNode } from "react";
import type { ExplorerSession } from "../stores/session.ts";

const ExplorerContext = createContext<ExplorerSession | null>(null);

interface ExplorerProviderProps {
  session: ExplorerSession;
  children: ReactNode;
}

export function ExplorerProvider({ session, children }: ExplorerProviderProps) {
  return <ExplorerContext.Provider value={session}>{children}</ExplorerContext.Provider>;
}

/** The session of the nearest ExplorerProvider. */
export function useExplorerSession(): ExplorerSession {
  const session = useContext(ExplorerContext);
  if (!session) {
    throw new Error("useExplorerSession must be used inside an ExplorerProvider");
  }
  return session;
}
