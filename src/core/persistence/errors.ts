function reasonOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

abstract class PersistenceError extends Error {
  abstract readonly kind: 'fileUnreadable' | 'contentUnparseable' | 'fileUnwritable' | 'contentUnserializable';

  constructor(
    message: string,
    readonly filePath: string,
    cause: unknown
  ) {
    super(message, { cause });
  }
}

export class FileUnreadableError extends PersistenceError {
  readonly kind = 'fileUnreadable';

  constructor(filePath: string, cause: unknown) {
    super(`Could not open file '${filePath}' for reading: ${reasonOf(cause)}`, filePath, cause);
    this.name = 'FileUnreadableError';
  }
}

export class ContentUnparseableError extends PersistenceError {
  readonly kind = 'contentUnparseable';

  constructor(filePath: string, cause: unknown) {
    super(`Could not read data from file '${filePath}': ${reasonOf(cause)}`, filePath, cause);
    this.name = 'ContentUnparseableError';
  }
}

export class FileUnwritableError extends PersistenceError {
  readonly kind = 'fileUnwritable';

  constructor(filePath: string, cause: unknown) {
    super(`Could not open file '${filePath}' for writing: ${reasonOf(cause)}`, filePath, cause);
    this.name = 'FileUnwritableError';
  }
}

export class ContentUnserializableError extends PersistenceError {
  readonly kind = 'contentUnserializable';

  constructor(filePath: string, cause: unknown) {
    super(`Could not write data to file '${filePath}': ${reasonOf(cause)}`, filePath, cause);
    this.name = 'ContentUnserializableError';
  }
}

export type LoadError = FileUnreadableError | ContentUnparseableError;
export type SaveError = FileUnwritableError | ContentUnserializableError;

export type LoadResult = { status: 'loaded'; path: string } | { status: 'cancelled' } | { status: 'failed'; error: LoadError };
export type SaveResult = { status: 'saved'; path: string } | { status: 'cancelled' } | { status: 'failed'; error: SaveError };
