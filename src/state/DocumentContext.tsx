import { createContext, useContext, type ReactNode } from 'react';
import { useStore } from 'zustand';
import type { DocumentStore, DocumentStoreState } from './useDocumentStore';

const DocumentContext = createContext<DocumentStore | null>(null);

export function DocumentProvider({ store, children }: { store: DocumentStore; children: ReactNode }) {
  return <DocumentContext.Provider value={store}>{children}</DocumentContext.Provider>;
}

export function useDocumentStoreApi(): DocumentStore {
  const store = useContext(DocumentContext);
  if (!store) throw new Error('useDocument must be used inside <DocumentProvider>');
  return store;
}

/** Select from the document of the nearest provider */
export function useDocument<T>(selector: (s: DocumentStoreState) => T): T {
  return useStore(useDocumentStoreApi(), selector);
}
