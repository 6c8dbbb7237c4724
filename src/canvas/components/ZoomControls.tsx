import { useEditorStore } from '../../store/useEditorStore';
import { ZoomIn, ZoomOut, Maximize2 } from 'lucide-react';

const iconButton =
  'h-8 w-8 flex items-center justify-center rounded-md text-muted-foreground hover:text-foreground hover:bg-white/10';

export function ZoomControls() {
  const targetZoom = useEditorStore(s => s.camera.targetZoom);
  const zoomBy = useEditorStore(s => s.zoomBy);
  const resetZoom = useEditorStore(s => s.resetZoom);

  return (
    <div className="absolute bottom-2 right-2 z-10 flex items-center gap-0.5 bg-card/90 backdrop-blur-sm border border-border rounded-lg px-1 py-1 shadow-sm select-none">
      <button className={iconButton} title="Zoom out (-)" onClick={() => zoomBy(0.5)}>
        <ZoomOut size={16} />
      </button>
      <span className="font-data text-xs text-muted-foreground w-10 text-center">
        {targetZoom >= 1 ? `${targetZoom}×` : `1/${1 / targetZoom}`}
      </span>
      <button className={iconButton} title="Zoom in (=)" onClick={() => zoomBy(2)}>
        <ZoomIn size={16} />
      </button>
      <div className="w-px h-4 bg-border mx-0.5" />
      <button className={iconButton} title="Actual size" onClick={resetZoom}>
        <Maximize2 size={16} />
      </button>
    </div>
  );
}
