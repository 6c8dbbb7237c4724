import { FolderOpen, Save, TriangleAlert } from 'lucide-react';
import { useEditorStore } from '../../store/useEditorStore';
import { stringifyDocument } from '../../model/document';
import { openFile, saveFile } from '../../utils/fileOps';
import { logger } from '../../utils/logger';
import { cn } from '../../lib/utils';

const DOCUMENT_FILE_NAME = 'elements.json';

export default function TopBar() {
  const tables = useEditorStore(s => s.tables);
  const activeTableName = useEditorStore(s => s.activeTableName);
  const changedSinceSave = useEditorStore(s => s.changedSinceSave);
  const loadError = useEditorStore(s => s.loadError);
  const switchTable = useEditorStore(s => s.switchTable);

  const handleSave = () => {
    const { exportDocument, markSaved } = useEditorStore.getState();
    const text = stringifyDocument(exportDocument());
    saveFile(DOCUMENT_FILE_NAME, text);
    markSaved();
    logger.info(`Saved ${DOCUMENT_FILE_NAME}`);
  };

  const handleOpen = () => {
    openFile('.json').then(
      (file) => {
        if (file) useEditorStore.getState().importJson(file.text, file.name);
      },
      (err: unknown) => logger.error('Could not read file', err),
    );
  };

  return (
    <div className="h-[26px] flex items-center gap-1 px-2 bg-card border-b border-border text-xs select-none">
      <button className="flex items-center gap-1 px-2 h-5 rounded hover:bg-white/10" onClick={handleOpen} title="Open">
        <FolderOpen size={12} /> Open
      </button>
      <button className="flex items-center gap-1 px-2 h-5 rounded hover:bg-white/10" onClick={handleSave} title="Save">
        <Save size={12} /> Save{changedSinceSave && ' •'}
      </button>
      <span className="text-muted-foreground px-1">|</span>
      {tables.map(t => (
        <button
          key={t.name}
          onClick={() => switchTable(t.name)}
          className={cn(
            'px-2 h-5 hover:bg-white/30 active:bg-white/10',
            t.name === activeTableName && 'bg-white/10 text-foreground',
          )}
        >
          {t.name}
        </button>
      ))}
      {loadError && (
        <span className="ml-auto flex items-center gap-1 text-destructive truncate" title={loadError}>
          <TriangleAlert size={12} /> {loadError}
        </span>
      )}
    </div>
  );
}
