/**
 * Where documents live. Implementations throw on failure; the persistence
 * gateway turns the throw into a typed error.
 */
export interface FileStore {
  /** Whole text content of `path` */
  read(path: string): string;
  /** Create or truncate `path` with `contents` */
  write(path: string, contents: string): void;
  /** Directory remembered after a successful load or save of `path` */
  parentOf(path: string): string;
}

/**
 * External chooser asked for a path by open / save-as.
 * `null` means the user cancelled.
 */
export interface PathChooser {
  chooseOpen(request: { directory?: string }): string | null;
  chooseSave(request: { directory?: string; file?: string }): string | null;
}

export const noPathChooser: PathChooser = {
  chooseOpen: () => null,
  chooseSave: () => null,
};
