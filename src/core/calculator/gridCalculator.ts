import type { Catalog } from '@/core/catalog/catalog';
import type { ModelCalculator } from '@/core/contracts/calculator';
import { createDefaultModel } from '@/core/model/gridModel';
import { isGridFileV1, normalizeGridFileV1, toGridFileV1 } from '@/lib/io/schema';
import {
  DIRECTIONS,
  type AxisFigures,
  type CatalogItem,
  type CountMap,
  type Direction,
  type GridModel,
  type GridOutputs,
  type HydrogenTier,
  type PowerTier,
  type ThrusterDetails,
  type ThrusterType,
  type TierFigures,
} from '@/types/grid';

/** Litres per item */
export const ICE_VOLUME = 0.37;
export const ORE_VOLUME = 0.37;
export const STEEL_PLATE_VOLUME = 3;
/** kg per item */
export const ICE_MASS = 1;
export const ORE_MASS = 1;
export const STEEL_PLATE_MASS = 20;
/** m/s² at gravity multiplier 1 */
export const STANDARD_GRAVITY = 9.81;

export class SerializeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SerializeError';
  }
}

export class DeserializeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeserializeError';
  }
}

function sumOver<D>(items: readonly CatalogItem<D>[], counts: CountMap, value: (item: CatalogItem<D>) => number): number {
  let total = 0;
  for (const item of items) {
    const n = counts[item.id] ?? 0;
    if (n !== 0) total += n * value(item);
  }
  return total;
}

function clamp(v: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, v));
}

export function thrusterEffectiveness(type: ThrusterType, planetaryInfluence: number): number {
  switch (type) {
    case 'hydrogen':
      return 1;
    case 'atmospheric':
      return clamp(planetaryInfluence, 0, 1);
    case 'ion':
      return clamp(1 - 0.8 * planetaryInfluence, 0.2, 1);
  }
}

function acceleration(force: number, mass: number): number {
  return mass > 0 ? force / mass : 0;
}

/** Vertical axes feel gravity; horizontal ones do not. */
function gravityOffset(dir: Direction, g: number): number {
  if (dir === 'up') return -g;
  if (dir === 'down') return g;
  return 0;
}

function powerTier(consumption: number, generation: number, capacityMWh: number): TierFigures {
  const balance = generation - consumption;
  // minutes until the batteries are drained
  const duration = balance < 0 ? (capacityMWh * 60) / -balance : Infinity;
  return { consumption, balance, duration };
}

function hydrogenTier(consumption: number, generation: number, capacityL: number): TierFigures {
  const balance = generation - consumption;
  const duration = balance < 0 ? capacityL / -balance / 60 : Infinity;
  return { consumption, balance, duration };
}

function calculate(model: GridModel, catalog: Catalog): GridOutputs {
  const { scalars, counts, directional } = model;
  const storage = counts.storage;

  // Volume & items
  const mult = scalars.containerMultiplier;
  const containers = catalog.group('containers');
  const anyVolume =
    (sumOver(containers, storage, (c) => (c.details.store === 'any' ? c.details.capacity : 0)) +
      sumOver(catalog.group('cockpits'), storage, (c) => (c.details.hasInventory ? c.details.capacity : 0))) *
    mult;
  const oreOnlyVolume = sumOver(containers, storage, (c) => (c.details.store === 'ore' ? c.details.capacity : 0)) * mult;
  const iceOnlyVolume =
    (sumOver(containers, storage, (c) => (c.details.store === 'ice' ? c.details.capacity : 0)) +
      sumOver(catalog.group('generators'), counts.generators, (g) => g.details.capacity)) *
    mult;
  const oreVolume = (anyVolume * scalars.anyFillWithOre) / 100;
  const iceVolume = (anyVolume * scalars.anyFillWithIce) / 100;

  const itemsIce = Math.floor((iceVolume + (iceOnlyVolume * scalars.iceOnlyFill) / 100) / ICE_VOLUME);
  const itemsOre = Math.floor((oreVolume + (oreOnlyVolume * scalars.oreOnlyFill) / 100) / ORE_VOLUME);
  const itemsSteel = Math.floor((anyVolume * scalars.anyFillWithSteelPlates) / 100 / STEEL_PLATE_VOLUME);

  // Mass
  let massEmpty = scalars.additionalMass;
  const countMaps: CountMap[] = [...Object.values(counts), ...Object.values(directional)];
  for (const map of countMaps) {
    for (const [id, n] of Object.entries(map)) {
      const item = catalog.get(id);
      if (item) massEmpty += item.mass * n;
    }
  }
  const massFilled = massEmpty + itemsIce * ICE_MASS + itemsOre * ORE_MASS + itemsSteel * STEEL_PLATE_MASS;

  // Force & acceleration
  const thrusters = catalog.group('thrusters');
  const g = STANDARD_GRAVITY * scalars.gravityMultiplier;
  const axis = (dir: Direction): AxisFigures => {
    const force = sumOver(
      thrusters,
      directional[dir],
      (t) => t.details.force * thrusterEffectiveness(t.details.type, scalars.planetaryInfluence)
    );
    const offset = gravityOffset(dir, g);
    return {
      force,
      accelerationEmptyNoGravity: acceleration(force, massEmpty),
      accelerationFilledNoGravity: acceleration(force, massFilled),
      accelerationEmptyGravity: acceleration(force, massEmpty) + offset,
      accelerationFilledGravity: acceleration(force, massFilled) + offset,
    };
  };
  const thrust: Record<Direction, AxisFigures> = {
    up: axis('up'),
    down: axis('down'),
    front: axis('front'),
    back: axis('back'),
    left: axis('left'),
    right: axis('right'),
  };

  const thrusterSum = (dirs: readonly Direction[], value: (t: CatalogItem<ThrusterDetails>) => number) =>
    dirs.reduce((acc, dir) => acc + sumOver(thrusters, directional[dir], value), 0);

  // Power (MW)
  const powerGeneration =
    sumOver(catalog.group('reactors'), counts.reactors, (r) => r.details.powerOutput) +
    sumOver(catalog.group('hydrogenEngines'), counts.hydrogenEngines, (e) => e.details.powerOutput);
  const capacityBattery = sumOver(catalog.group('batteries'), counts.batteries, (b) => b.details.capacity);

  const powerIdle = thrusterSum(DIRECTIONS, (t) => t.details.powerIdle);
  const powerActive = (dirs: readonly Direction[]) => thrusterSum(dirs, (t) => t.details.powerMax - t.details.powerIdle);
  // Tiers are cumulative: each one adds its step to everything before it
  let powerConsumed = 0;
  const powerStep = (amount: number) => {
    powerConsumed += amount;
    return powerTier(powerConsumed, powerGeneration, capacityBattery);
  };
  const powerTiers: Record<PowerTier, TierFigures> = {
    idle: powerStep(powerIdle),
    misc: powerStep(0),
    uptoJumpDrive: powerStep(sumOver(catalog.group('jumpDrives'), counts.jumpDrives, (j) => j.details.powerInput)),
    uptoGenerator: powerStep(
      sumOver(catalog.group('generators'), counts.generators, (gen) => gen.details.powerConsumption)
    ),
    uptoUpDownThruster: powerStep(powerActive(['up', 'down'])),
    uptoFrontBackThruster: powerStep(powerActive(['front', 'back'])),
    uptoLeftRightThruster: powerStep(powerActive(['left', 'right'])),
    uptoBattery: powerStep(sumOver(catalog.group('batteries'), counts.batteries, (b) => b.details.input)),
  };

  // Hydrogen (L/s)
  const hydrogenGeneration = sumOver(catalog.group('generators'), counts.generators, (gen) => gen.details.hydrogenGeneration);
  const capacityEngine = sumOver(catalog.group('hydrogenEngines'), counts.hydrogenEngines, (e) => e.details.fuelCapacity);
  const capacityTank = sumOver(catalog.group('hydrogenTanks'), counts.hydrogenTanks, (t) => t.details.capacity);

  const hydrogenActive = (dirs: readonly Direction[]) =>
    thrusterSum(dirs, (t) => t.details.hydrogenMax - t.details.hydrogenIdle);
  let hydrogenConsumed = 0;
  const hydrogenStep = (amount: number) => {
    hydrogenConsumed += amount;
    return hydrogenTier(hydrogenConsumed, hydrogenGeneration, capacityTank + capacityEngine);
  };
  const hydrogenTiers: Record<HydrogenTier, TierFigures> = {
    idle: hydrogenStep(thrusterSum(DIRECTIONS, (t) => t.details.hydrogenIdle)),
    engine: hydrogenStep(
      sumOver(catalog.group('hydrogenEngines'), counts.hydrogenEngines, (e) => e.details.fuelConsumption)
    ),
    uptoUpDownThruster: hydrogenStep(hydrogenActive(['up', 'down'])),
    uptoFrontBackThruster: hydrogenStep(hydrogenActive(['front', 'back'])),
    uptoLeftRightThruster: hydrogenStep(hydrogenActive(['left', 'right'])),
  };

  return {
    volume: { any: anyVolume, ore: oreVolume, ice: iceVolume, oreOnly: oreOnlyVolume, iceOnly: iceOnlyVolume },
    mass: { empty: massEmpty, filled: massFilled },
    items: { ice: itemsIce, ore: itemsOre, steelPlates: itemsSteel },
    thrust,
    power: { generation: powerGeneration, capacityBattery, tiers: powerTiers },
    hydrogen: { generation: hydrogenGeneration, capacityEngine, capacityTank, tiers: hydrogenTiers },
  };
}

function assertFinite(model: GridModel): void {
  for (const [key, value] of Object.entries(model.scalars)) {
    if (!Number.isFinite(value)) throw new SerializeError(`Scalar "${key}" is not a finite number`);
  }
  const maps: CountMap[] = [...Object.values(model.counts), ...Object.values(model.directional)];
  for (const map of maps) {
    for (const [id, n] of Object.entries(map)) {
      if (!Number.isInteger(n) || n < 0) throw new SerializeError(`Count of "${id}" is not a non-negative integer`);
    }
  }
}

/**
 * Reference calculator for grid documents.
 */
export const gridCalculator: ModelCalculator = {
  createDefault: createDefaultModel,
  calculate,

  serialize(model) {
    assertFinite(model);
    return JSON.stringify(toGridFileV1(model), null, 2);
  },

  deserialize(text, catalog) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      throw new DeserializeError(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!isGridFileV1(parsed)) {
      throw new DeserializeError('Invalid grid file format (unsupported version or invalid structure)');
    }
    const { model, dropped } = normalizeGridFileV1(parsed, (slot, id) => catalog.belongsTo(slot, id));
    if (dropped.length > 0) {
      console.warn(`[io] dropped ${dropped.length} unknown or misplaced catalog id(s):`, dropped.join(', '));
    }
    return model;
  },
};
