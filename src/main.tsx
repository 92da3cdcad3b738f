import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import './index.css';
import { readConfig } from '@/lib/config';
import { createLocalFileStore } from '@/lib/io/localFileStore';
import { createPromptPathChooser } from '@/lib/io/promptPathChooser';
import { DocumentProvider } from '@/state/DocumentContext';
import { createDocumentStore } from '@/state/useDocumentStore';

const config = readConfig();
const fileStore = createLocalFileStore(config.storageKey);
const store = createDocumentStore({
  fileStore,
  pathChooser: createPromptPathChooser(() => fileStore.list()),
  initialDirectory: config.initialDirectory,
});

const root = document.getElementById('root');
if (!root) throw new Error('#root element missing from index.html');

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <DocumentProvider store={store}>
      <App outputDecimals={config.outputDecimals} />
    </DocumentProvider>
  </React.StrictMode>,
);
