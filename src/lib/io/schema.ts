/**
 * Schema and validation for the JSON grid document format v1
 */

import { SCALAR_DEFAULTS } from '@/constants/scalarFields';
import { createCountMaps, createDirectionalCounts } from '@/core/model/gridModel';
import { isFiniteNumber, isRecord } from '@/lib/typeGuards';
import {
  COUNT_GROUPS,
  DIRECTIONS,
  SCALAR_KEYS,
  type CatalogItemId,
  type CountGroup,
  type CountMap,
  type CountSlot,
  type Direction,
  type GridModel,
  type ScalarKey,
} from '@/types/grid';

export type GridFileV1 = {
  version: 1;
  scalars?: Partial<Record<ScalarKey, number>>;
  counts?: Partial<Record<CountGroup, CountMap>>;
  directional?: Partial<Record<Direction, CountMap>>;
};

const scalarKeys: ReadonlySet<string> = new Set(SCALAR_KEYS);
const countGroups: ReadonlySet<string> = new Set(COUNT_GROUPS);
const directions: ReadonlySet<string> = new Set(DIRECTIONS);

function isScalarKey(k: string): k is ScalarKey {
  return scalarKeys.has(k);
}

function isCountGroup(k: string): k is CountGroup {
  return countGroups.has(k);
}

function isDirection(k: string): k is Direction {
  return directions.has(k);
}

function isCountMap(x: unknown): x is CountMap {
  if (!isRecord(x)) return false;
  return Object.values(x).every(isFiniteNumber);
}

/**
 * Type guard: validate GridFileV1 structure.
 * Unknown scalar keys are tolerated; unknown groups or directions are not.
 */
export function isGridFileV1(x: unknown): x is GridFileV1 {
  if (!isRecord(x)) return false;

  // Check version
  if (x.version !== 1) return false;

  // Check scalars
  if (x.scalars !== undefined) {
    if (!isRecord(x.scalars)) return false;
    for (const [key, value] of Object.entries(x.scalars)) {
      if (isScalarKey(key) && !isFiniteNumber(value)) return false;
    }
  }

  // Check counts
  if (x.counts !== undefined) {
    if (!isRecord(x.counts)) return false;
    for (const [group, map] of Object.entries(x.counts)) {
      if (!isCountGroup(group)) return false;
      if (!isCountMap(map)) return false;
    }
  }

  // Check directional
  if (x.directional !== undefined) {
    if (!isRecord(x.directional)) return false;
    for (const [dir, map] of Object.entries(x.directional)) {
      if (!isDirection(dir)) return false;
      if (!isCountMap(map)) return false;
    }
  }

  return true;
}

export type NormalizedGridFile = {
  model: GridModel;
  /** Catalog ids present in the file but unknown to the catalog */
  dropped: CatalogItemId[];
};

function normalizeCountMap(
  map: CountMap | undefined,
  isKnown: (id: CatalogItemId) => boolean,
  dropped: CatalogItemId[]
): CountMap {
  const out: CountMap = {};
  if (!map) return out;
  for (const [id, count] of Object.entries(map)) {
    if (!isKnown(id)) {
      dropped.push(id);
      continue;
    }
    out[id] = Math.max(0, Math.floor(count));
  }
  return out;
}

/**
 * Normalize GridFileV1 data into a complete model:
 * - Missing scalars take their defaults
 * - Counts floored and clamped ≥ 0
 * - Ids that do not belong to their map's slot are dropped (and reported)
 * - Every count group and all six directions exist afterwards
 */
export function normalizeGridFileV1(
  f: GridFileV1,
  belongsTo: (slot: CountSlot, id: CatalogItemId) => boolean
): NormalizedGridFile {
  const dropped: CatalogItemId[] = [];

  const scalars = { ...SCALAR_DEFAULTS };
  for (const key of SCALAR_KEYS) {
    const value = f.scalars?.[key];
    if (value !== undefined) scalars[key] = value;
  }

  const counts = createCountMaps();
  for (const group of COUNT_GROUPS) {
    counts[group] = normalizeCountMap(f.counts?.[group], (id) => belongsTo(group, id), dropped);
  }

  const directional = createDirectionalCounts();
  for (const dir of DIRECTIONS) {
    directional[dir] = normalizeCountMap(f.directional?.[dir], (id) => belongsTo('directional', id), dropped);
  }

  return { model: { scalars, counts, directional }, dropped };
}

/** Inverse of {@link normalizeGridFileV1}; zero counts are kept as present values. */
export function toGridFileV1(model: GridModel): GridFileV1 {
  return {
    version: 1,
    scalars: { ...model.scalars },
    counts: Object.fromEntries(COUNT_GROUPS.map((g) => [g, { ...model.counts[g] }])),
    directional: Object.fromEntries(DIRECTIONS.map((d) => [d, { ...model.directional[d] }])),
  };
}
