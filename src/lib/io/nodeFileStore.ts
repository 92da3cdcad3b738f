import { readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { FileStore } from '@/core/contracts/fileStore';

/** Documents on the local file system, UTF-8 text. */
export const nodeFileStore: FileStore = {
  read: (path) => readFileSync(path, 'utf8'),
  write: (path, contents) => writeFileSync(path, contents, 'utf8'),
  parentOf: (path) => dirname(path),
};
