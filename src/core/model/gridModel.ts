import { SCALAR_DEFAULTS } from '@/constants/scalarFields';
import type { CountGroup, CountMap, DirectionalCounts, GridModel } from '@/types/grid';

/**
 * All six directions are present from construction on; accessors never
 * have to guard against a missing direction.
 */
export function createDirectionalCounts(): DirectionalCounts {
  return { up: {}, down: {}, front: {}, back: {}, left: {}, right: {} };
}

export function createCountMaps(): Record<CountGroup, CountMap> {
  return {
    storage: {},
    hydrogenEngines: {},
    reactors: {},
    batteries: {},
    jumpDrives: {},
    generators: {},
    hydrogenTanks: {},
  };
}

export function createDefaultModel(): GridModel {
  return {
    scalars: { ...SCALAR_DEFAULTS },
    counts: createCountMaps(),
    directional: createDirectionalCounts(),
  };
}
