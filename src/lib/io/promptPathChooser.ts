import type { PathChooser } from '@/core/contracts/fileStore';
import type { StoredFileMeta } from './localFileStore';

const join = (directory: string | undefined, name: string) => (directory ? `${directory}/${name}` : name);

/**
 * Browser path chooser on top of `window.prompt`, listing the files the
 * local store already knows. Empty input cancels.
 */
export function createPromptPathChooser(listFiles: () => StoredFileMeta[]): PathChooser {
  const ask = (message: string, suggestion: string): string | null => {
    const answer = window.prompt(message, suggestion);
    if (answer === null) return null;
    const trimmed = answer.trim();
    return trimmed === '' ? null : trimmed;
  };

  return {
    chooseOpen({ directory }) {
      const known = listFiles().map((f) => f.path);
      const hint = known.length > 0 ? `\nKnown files:\n${known.join('\n')}` : '';
      return ask(`Open grid file:${hint}`, join(directory, ''));
    },
    chooseSave({ directory, file }) {
      return ask('Save grid file as:', file ?? join(directory, 'grid.json'));
    },
  };
}
