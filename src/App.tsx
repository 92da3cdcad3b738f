import { useEffect } from 'react';
import { BlockInputGrid } from '@/components/BlockInputGrid';
import { FileToolbar } from '@/components/FileToolbar';
import { OutputTable } from '@/components/OutputTable';
import { ScalarInputs } from '@/components/ScalarInputs';
import Toast from '@/components/Toast';
import { OUTPUT_TABLES } from '@/constants/outputs';
import { useDocument } from '@/state/DocumentContext';

export default function App({ outputDecimals = 2 }: { outputDecimals?: number }) {
  const layout = useDocument((s) => s.layout);
  const open = useDocument((s) => s.open);
  const saveOrSaveAs = useDocument((s) => s.saveOrSaveAs);

  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if (!(e.ctrlKey || e.metaKey) || e.altKey || e.shiftKey) return;
      const key = e.key.toLowerCase();
      // Ctrl+O → Open, Ctrl+S → Save (or Save As when untitled)
      if (key === 'o') {
        e.preventDefault();
        open();
      } else if (key === 's') {
        e.preventDefault();
        saveOrSaveAs();
      }
    };
    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, [open, saveOrSaveAs]);

  return (
    <main className="app">
      <FileToolbar />
      <div className="app-columns">
        <div className="inputs">
          <ScalarInputs />
          {layout.map((section) => (
            <BlockInputGrid key={section.key} section={section} />
          ))}
        </div>
        <div className="outputs">
          {OUTPUT_TABLES.map((table) => (
            <OutputTable key={table.title} table={table} decimals={outputDecimals} />
          ))}
        </div>
      </div>
      <Toast />
    </main>
  );
}
