export type BorrowMode = 'read' | 'write';

/** Re-entrant access to a document. Always a programming error. */
export class BorrowError extends Error {
  constructor(
    readonly requested: BorrowMode,
    readonly held: BorrowMode
  ) {
    super(`Cannot take a ${requested} borrow while a ${held} borrow is outstanding`);
    this.name = 'BorrowError';
  }
}

/**
 * Single-writer guard of one document: at most one borrow, shared-read or
 * exclusive-write, is outstanding at any time. Mutations run under
 * `write`, recalculation and display pushes under `read`.
 */
export class DocumentBorrow {
  private held: BorrowMode | null = null;

  get current(): BorrowMode | null {
    return this.held;
  }

  read<T>(fn: () => T): T {
    return this.hold('read', fn);
  }

  write<T>(fn: () => T): T {
    return this.hold('write', fn);
  }

  private hold<T>(mode: BorrowMode, fn: () => T): T {
    if (this.held) throw new BorrowError(mode, this.held);
    this.held = mode;
    try {
      return fn();
    } finally {
      this.held = null;
    }
  }
}
