// @vitest-environment node
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { nodeFileStore } from './nodeFileStore';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'gridcalc-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('nodeFileStore', () => {
  it('writes, truncates and reads files', () => {
    const path = join(dir, 'grid.json');
    nodeFileStore.write(path, 'first version');
    nodeFileStore.write(path, 'second');
    expect(nodeFileStore.read(path)).toBe('second');
  });

  it('throws for a missing file', () => {
    expect(() => nodeFileStore.read(join(dir, 'missing.json'))).toThrow(/ENOENT/);
  });

  it('throws when the directory does not exist', () => {
    expect(() => nodeFileStore.write(join(dir, 'no', 'such', 'grid.json'), 'x')).toThrow(/ENOENT/);
  });

  it('reports the parent directory', () => {
    expect(nodeFileStore.parentOf(join(dir, 'grid.json'))).toBe(dir);
  });
});
