import { create } from 'zustand';
import { produce } from 'immer';
import { TOAST_DURATION_MS } from '@/constants/ui';
import { gridCalculator } from '@/core/calculator/gridCalculator';
import { loadDefaultCatalog, type Catalog } from '@/core/catalog/catalog';
import type { ModelCalculator } from '@/core/contracts/calculator';
import type { DisplaySink } from '@/core/contracts/displaySink';
import { noPathChooser, type FileStore, type PathChooser } from '@/core/contracts/fileStore';
import {
  ContentUnparseableError,
  ContentUnserializableError,
  FileUnreadableError,
  FileUnwritableError,
  type LoadError,
  type LoadResult,
  type SaveError,
  type SaveResult,
} from '@/core/persistence/errors';
import { flattenOutputs, type FlatOutputs } from '@/lib/outputs';
import type { GridModel } from '@/types/grid';
import { DocumentBorrow } from './borrow';
import type { FieldId } from './bindings.fields';
import { FieldRegistry, UnknownFieldError, type LayoutSection } from './bindings.registry';

export type DocumentState = {
  model: GridModel;
  /** Text of every bound field, keyed by field id */
  fields: Record<FieldId, string>;
  /** Latest derived values, flattened */
  outputs: FlatOutputs;
  /** Number of recalculations so far */
  revision: number;
  layout: readonly LayoutSection[];
  session: {
    currentDirPath?: string;
    currentFilePath?: string;
  };
  ui: {
    toast?: {
      message: string;
      until: number;
    };
    lastError?: LoadError | SaveError;
  };
};

type DocumentActions = {
  /** Accept new text for a field, update the model, recalculate once */
  editField: (id: FieldId, text: string) => void;
  recalculate: () => void;
  load: (path: string) => LoadResult;
  save: (path: string) => SaveResult;
  open: () => LoadResult;
  saveAs: () => SaveResult;
  saveOrSaveAs: () => SaveResult;
  /** Returns the detach function */
  attachSink: (sink: DisplaySink) => () => void;
  dismissToast: () => void;
};

export type DocumentStoreState = DocumentState & DocumentActions;

export type DocumentStoreOptions = {
  fileStore: FileStore;
  pathChooser?: PathChooser;
  catalog?: Catalog;
  calculator?: ModelCalculator;
  sinks?: readonly DisplaySink[];
  /** Suggested to the first open / save-as */
  initialDirectory?: string;
};

type Attempt<T> = { ok: true; value: T } | { ok: false; cause: unknown };

function attempt<T>(fn: () => T): Attempt<T> {
  try {
    return { ok: true, value: fn() };
  } catch (cause) {
    return { ok: false, cause };
  }
}

/**
 * One store per open document. Each store owns its model, its field
 * texts and its display sinks; nothing is shared between documents except
 * the read-only catalog.
 */
export function createDocumentStore(options: DocumentStoreOptions) {
  const catalog = options.catalog ?? loadDefaultCatalog();
  const calculator = options.calculator ?? gridCalculator;
  const pathChooser = options.pathChooser ?? noPathChooser;
  const { fileStore } = options;
  const registry = new FieldRegistry(catalog);
  const borrow = new DocumentBorrow();
  const sinks = new Set<DisplaySink>(options.sinks);

  const pushAll = (targets: Iterable<DisplaySink>, outputs: FlatOutputs) => {
    for (const sink of targets) {
      for (const [key, value] of Object.entries(outputs)) sink.update(key, value);
    }
  };

  const model = calculator.createDefault();

  const store = create<DocumentStoreState>((set, get) => {
    const report = (error: LoadError | SaveError) => {
      console.warn(`[persistence] ${error.message}`);
      borrow.write(() =>
        set(produce((draft: DocumentState) => {
          draft.ui.lastError = error;
          draft.ui.toast = { message: error.message, until: Date.now() + TOAST_DURATION_MS };
        }))
      );
    };

    const rememberIn = (draft: DocumentState, path: string) => {
      draft.session.currentFilePath = path;
      draft.session.currentDirPath = fileStore.parentOf(path);
      draft.ui.lastError = undefined;
    };

    return {
      model,
      fields: registry.initialFields(model),
      outputs: {},
      revision: 0,
      layout: registry.sections,
      session: { currentDirPath: options.initialDirectory },
      ui: {},

      editField: (id, text) => {
        if (!registry.has(id)) throw new UnknownFieldError(id);
        borrow.write(() =>
          set(produce((draft: DocumentState) => {
            draft.fields[id] = text;
            registry.write(draft.model, id, text);
          }))
        );
        get().recalculate();
      },

      recalculate: () =>
        borrow.read(() => {
          const outputs = flattenOutputs(calculator.calculate(get().model, catalog));
          set(produce((draft: DocumentState) => {
            draft.outputs = outputs;
            draft.revision++;
          }));
          pushAll(sinks, outputs);
        }),

      load: (path) => {
        const read = attempt(() => fileStore.read(path));
        if (!read.ok) {
          const error = new FileUnreadableError(path, read.cause);
          report(error);
          return { status: 'failed', error };
        }
        const parsed = attempt(() => calculator.deserialize(read.value, catalog));
        if (!parsed.ok) {
          const error = new ContentUnparseableError(path, parsed.cause);
          report(error);
          return { status: 'failed', error };
        }

        // Model, every field and the session change in one transition
        borrow.write(() => {
          set(produce((draft: DocumentState) => {
            draft.model = parsed.value;
            registry.refresh(draft.fields, parsed.value);
            rememberIn(draft, path);
          }));
        });
        get().recalculate();
        return { status: 'loaded', path };
      },

      save: (path) => {
        const serialized = borrow.read(() => attempt(() => calculator.serialize(get().model)));
        if (!serialized.ok) {
          const error = new ContentUnserializableError(path, serialized.cause);
          report(error);
          return { status: 'failed', error };
        }
        const written = attempt(() => fileStore.write(path, serialized.value));
        if (!written.ok) {
          const error = new FileUnwritableError(path, written.cause);
          report(error);
          return { status: 'failed', error };
        }
        borrow.write(() => set(produce((draft: DocumentState) => rememberIn(draft, path))));
        return { status: 'saved', path };
      },

      open: () => {
        const path = pathChooser.chooseOpen({ directory: get().session.currentDirPath });
        if (path === null) return { status: 'cancelled' };
        return get().load(path);
      },

      saveAs: () => {
        const { currentDirPath, currentFilePath } = get().session;
        const path = pathChooser.chooseSave({ directory: currentDirPath, file: currentFilePath });
        if (path === null) return { status: 'cancelled' };
        return get().save(path);
      },

      saveOrSaveAs: () => {
        const current = get().session.currentFilePath;
        return current === undefined ? get().saveAs() : get().save(current);
      },

      attachSink: (sink) => {
        sinks.add(sink);
        borrow.read(() => pushAll([sink], get().outputs));
        return () => {
          sinks.delete(sink);
        };
      },

      dismissToast: () =>
        set(produce((draft: DocumentState) => {
          draft.ui.toast = undefined;
        })),
    };
  });

  store.getState().recalculate();
  return store;
}

export type DocumentStore = ReturnType<typeof createDocumentStore>;
