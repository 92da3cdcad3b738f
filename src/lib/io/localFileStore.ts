/**
 * localStorage-backed file store used by the browser build.
 * Each path keeps its text under its own key; a metadata list records
 * every stored path.
 */
import type { FileStore } from '@/core/contracts/fileStore';
import { isRecord } from '@/lib/typeGuards';

const encoder = new TextEncoder();

export type StoredFileMeta = {
  path: string;
  updatedAt: string;
  /** UTF-8 size of the contents */
  bytes: number;
};

function isStoredFileMeta(x: unknown): x is StoredFileMeta {
  return (
    isRecord(x) && typeof x.path === 'string' && typeof x.updatedAt === 'string' && typeof x.bytes === 'number'
  );
}

/** Everything before the last `/`, or `''` for a bare name */
export function parentOfStoragePath(path: string): string {
  const i = path.lastIndexOf('/');
  return i > 0 ? path.slice(0, i) : '';
}

export type LocalFileStore = FileStore & {
  /** Known files, newest first */
  list(): StoredFileMeta[];
  remove(path: string): void;
};

export function createLocalFileStore(namespace: string, storage: Storage = localStorage): LocalFileStore {
  const keyList = namespace;
  const keyItem = (path: string) => `${namespace}.${path}`;

  const list = (): StoredFileMeta[] => {
    const raw = storage.getItem(keyList);
    if (!raw) return [];
    try {
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed)) return [];
      return parsed.filter(isStoredFileMeta).sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
    } catch (err) {
      console.warn('[files] ignoring corrupt file list:', err);
      return [];
    }
  };

  return {
    list,

    read(path) {
      const raw = storage.getItem(keyItem(path));
      if (raw === null) throw new Error(`No such file: ${path}`);
      return raw;
    },

    write(path, contents) {
      const meta: StoredFileMeta = { path, updatedAt: new Date().toISOString(), bytes: encoder.encode(contents).length };
      const next = list().filter((m) => m.path !== path);
      next.push(meta);

      // setItem throws when the quota is exceeded; the caller reports it
      const previous = storage.getItem(keyItem(path));
      storage.setItem(keyItem(path), contents);
      try {
        storage.setItem(keyList, JSON.stringify(next));
      } catch (err) {
        if (previous === null) storage.removeItem(keyItem(path));
        else storage.setItem(keyItem(path), previous);
        throw err;
      }
    },

    parentOf: parentOfStoragePath,

    remove(path) {
      storage.removeItem(keyItem(path));
      storage.setItem(keyList, JSON.stringify(list().filter((m) => m.path !== path)));
    },
  };
}
