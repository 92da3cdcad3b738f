import { useDocument } from '@/state/DocumentContext';

export function FileToolbar() {
  const open = useDocument((s) => s.open);
  const saveOrSaveAs = useDocument((s) => s.saveOrSaveAs);
  const saveAs = useDocument((s) => s.saveAs);
  const currentFilePath = useDocument((s) => s.session.currentFilePath);

  // Results are already reported through the toast
  return (
    <div className="file-toolbar" role="toolbar">
      <button type="button" onClick={() => open()}>
        Open
      </button>
      <button type="button" onClick={() => saveOrSaveAs()}>
        Save
      </button>
      <button type="button" onClick={() => saveAs()}>
        Save As
      </button>
      <span className="file-path" data-testid="current-file">
        {currentFilePath ?? 'Untitled'}
      </span>
    </div>
  );
}
