import { useEffect, useMemo } from 'react';
import TopBar from './components/TopBar/TopBar';
import PropertyPanel from './components/PropertyPanel/PropertyPanel';
import EditorCanvas from './canvas/EditorCanvas';
import { ErrorBoundary } from './components/ErrorBoundary';
import { EmptyState } from './components/ui/empty-state';
import { useEditorStore } from './store/useEditorStore';
import { loadEditorConfig } from './config';
import { logger } from './utils/logger';

function App() {
  const config = useMemo(() => loadEditorConfig(import.meta.env), []);
  const hasTables = useEditorStore(s => s.tables.length > 0);

  useEffect(() => {
    const controller = new AbortController();
    fetch(config.documentUrl, { signal: controller.signal })
      .then(res => {
        if (!res.ok) throw new Error(`HTTP ${res.status}`);
        return res.text();
      })
      .then(text => useEditorStore.getState().importJson(text, config.documentUrl))
      .catch((err: unknown) => {
        if (controller.signal.aborted) return;
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Could not fetch ${config.documentUrl}`, message);
        useEditorStore.getState().setLoadError(`${config.documentUrl}: ${message}`);
      });
    return () => controller.abort();
  }, [config]);

  return (
    <div className="flex flex-col h-screen w-screen overflow-hidden bg-background text-foreground">
      <TopBar />
      <div className="flex-1 min-h-0 relative overflow-hidden">
        <ErrorBoundary fallbackTitle="Canvas failed">
          {hasTables ? <EditorCanvas config={config} /> : <EmptyState message="No element document loaded" />}
          <PropertyPanel />
        </ErrorBoundary>
      </div>
    </div>
  );
}

export default App;
