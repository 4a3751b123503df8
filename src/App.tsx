import { useEffect } from "react";
import { ExplorerBoard } from "./components/ExplorerBoard.tsx";
import { LoadingOverlay } from "./components/LoadingOverlay.tsx";
import { ExplorerProvider } from "./context/ExplorerContext.tsx";
import { useDataset } from "./hooks/useDataset.ts";
import "./index.css";

function App() {
  const { load, loading, error, session } = useDataset();

  useEffect(() => {
    void load();
  }, [load]);

  return (
    <div className="h-screen w-screen overflow-hidden bg-bg-primary">
      {/* Header */}
      <header className="flex h-12 items-center border-b border-bg-tertiary bg-bg-secondary px-4">
        <h1 className="text-lg font-bold text-text-primary">
          <span className="text-accent">Data</span>{" "}
          <span className="text-text-secondary font-normal">Explorer</span>
        </h1>
      </header>

      {/* Error banner */}
      {error && (
        <div className="border-b border-danger bg-danger/20 px-4 py-2 text-sm text-danger">
          Could not load dataset: {error}
        </div>
      )}

      {/* Main workspace */}
      <main className="relative h-[calc(100vh-3rem)]">
        <LoadingOverlay loading={loading} />
        {session && (
          <ExplorerProvider session={session}>
            <ExplorerBoard />
          </ExplorerProvider>
        )}
      </main>
    </div>
  );
}

export default App;
