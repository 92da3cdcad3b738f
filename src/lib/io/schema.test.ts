import { describe, it, expect } from 'vitest';
import { createDefaultModel } from '@/core/model/gridModel';
import type { CountSlot } from '@/types/grid';
import { isGridFileV1, normalizeGridFileV1, toGridFileV1, type GridFileV1 } from './schema';

const storage = new Set(['crate.a', 'crate.b']);
const thrusters = new Set(['jet.h']);
const isKnown = (slot: CountSlot, id: string) =>
  slot === 'storage' ? storage.has(id) : slot === 'directional' && thrusters.has(id);

describe('isGridFileV1', () => {
  const validFile: GridFileV1 = {
    version: 1,
    scalars: { gravityMultiplier: 0.5 },
    counts: { storage: { 'crate.a': 3 } },
    directional: { up: { 'jet.h': 2 } },
  };

  it('returns true for a valid v1 file', () => {
    expect(isGridFileV1(validFile)).toBe(true);
  });

  it('returns true for a bare version marker', () => {
    expect(isGridFileV1({ version: 1 })).toBe(true);
  });

  it('returns false for non-objects and other versions', () => {
    expect(isGridFileV1(null)).toBe(false);
    expect(isGridFileV1('grid')).toBe(false);
    expect(isGridFileV1([])).toBe(false);
    expect(isGridFileV1({ ...validFile, version: 2 })).toBe(false);
  });

  it('returns false for a non-numeric scalar', () => {
    expect(isGridFileV1({ version: 1, scalars: { gravityMultiplier: '1' } })).toBe(false);
  });

  it('tolerates unknown scalar keys', () => {
    expect(isGridFileV1({ version: 1, scalars: { legacyField: 'x' } })).toBe(true);
  });

  it('returns false for unknown groups or directions', () => {
    expect(isGridFileV1({ version: 1, counts: { weapons: {} } })).toBe(false);
    expect(isGridFileV1({ version: 1, directional: { sideways: {} } })).toBe(false);
  });

  it('returns false for non-numeric counts', () => {
    expect(isGridFileV1({ version: 1, counts: { storage: { 'crate.a': '3' } } })).toBe(false);
  });
});

describe('normalizeGridFileV1', () => {
  it('fills missing scalars, groups and directions', () => {
    const { model, dropped } = normalizeGridFileV1({ version: 1 }, isKnown);
    expect(model).toEqual(createDefaultModel());
    expect(dropped).toEqual([]);
  });

  it('floors and clamps counts', () => {
    const { model } = normalizeGridFileV1(
      { version: 1, counts: { storage: { 'crate.a': 2.7, 'crate.b': -3 } } },
      isKnown
    );
    expect(model.counts.storage).toEqual({ 'crate.a': 2, 'crate.b': 0 });
  });

  it('drops ids unknown to the catalog', () => {
    const { model, dropped } = normalizeGridFileV1(
      { version: 1, counts: { storage: { 'crate.a': 1, 'crate.z': 4 } }, directional: { left: { 'jet.q': 1 } } },
      isKnown
    );
    expect(model.counts.storage).toEqual({ 'crate.a': 1 });
    expect(model.directional.left).toEqual({});
    expect(dropped).toEqual(['crate.z', 'jet.q']);
  });

  it('drops known ids filed under the wrong map', () => {
    const { model, dropped } = normalizeGridFileV1(
      { version: 1, counts: { reactors: { 'crate.a': 2 } }, directional: { up: { 'crate.b': 1, 'jet.h': 3 } } },
      isKnown
    );
    expect(model.counts.reactors).toEqual({});
    expect(model.directional.up).toEqual({ 'jet.h': 3 });
    expect(dropped).toEqual(['crate.a', 'crate.b']);
  });

  it('keeps provided scalar values', () => {
    const { model } = normalizeGridFileV1({ version: 1, scalars: { additionalMass: 250 } }, isKnown);
    expect(model.scalars.additionalMass).toBe(250);
    expect(model.scalars.iceOnlyFill).toBe(100);
  });
});

describe('toGridFileV1', () => {
  it('round-trips through normalize', () => {
    const model = createDefaultModel();
    model.scalars.planetaryInfluence = 0.25;
    model.counts.storage['crate.a'] = 0;
    model.directional.down['jet.h'] = 4;

    const file = toGridFileV1(model);
    expect(isGridFileV1(file)).toBe(true);
    expect(normalizeGridFileV1(file, isKnown).model).toEqual(model);
  });

  it('copies the maps instead of sharing them', () => {
    const model = createDefaultModel();
    const file = toGridFileV1(model);
    model.counts.storage['crate.a'] = 5;
    expect(file.counts?.storage).toEqual({});
  });
});
