export type CatalogItemId = string;

export type SizeClass = 'small' | 'large';

export const DIRECTIONS = ['up', 'down', 'front', 'back', 'left', 'right'] as const;
export type Direction = (typeof DIRECTIONS)[number];

// ─────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────

export type CatalogItem<D> = {
  id: CatalogItemId;
  name: string;
  size: SizeClass;
  /** kg */
  mass: number;
  details: D;
};

export type ContainerDetails = { capacity: number; store: 'any' | 'ore' | 'ice' };
export type CockpitDetails = { capacity: number; hasInventory: boolean };
export type ThrusterType = 'ion' | 'atmospheric' | 'hydrogen';
export type ThrusterDetails = {
  type: ThrusterType;
  force: number;
  powerMax: number;
  powerIdle: number;
  hydrogenMax: number;
  hydrogenIdle: number;
};
export type HydrogenEngineDetails = { powerOutput: number; fuelCapacity: number; fuelConsumption: number };
export type ReactorDetails = { powerOutput: number };
export type BatteryDetails = { capacity: number; input: number; output: number };
export type JumpDriveDetails = { powerInput: number };
export type GeneratorDetails = { capacity: number; powerConsumption: number; hydrogenGeneration: number };
export type HydrogenTankDetails = { capacity: number };

export type CatalogData = {
  containers: CatalogItem<ContainerDetails>[];
  cockpits: CatalogItem<CockpitDetails>[];
  thrusters: CatalogItem<ThrusterDetails>[];
  hydrogenEngines: CatalogItem<HydrogenEngineDetails>[];
  reactors: CatalogItem<ReactorDetails>[];
  batteries: CatalogItem<BatteryDetails>[];
  jumpDrives: CatalogItem<JumpDriveDetails>[];
  generators: CatalogItem<GeneratorDetails>[];
  hydrogenTanks: CatalogItem<HydrogenTankDetails>[];
};

export type CatalogGroup = keyof CatalogData;

// ─────────────────────────────────────────────────────────────────────────
// Model State
// ─────────────────────────────────────────────────────────────────────────

export const SCALAR_KEYS = [
  'gravityMultiplier',
  'containerMultiplier',
  'planetaryInfluence',
  'additionalMass',
  'iceOnlyFill',
  'oreOnlyFill',
  'anyFillWithIce',
  'anyFillWithOre',
  'anyFillWithSteelPlates',
] as const;
export type ScalarKey = (typeof SCALAR_KEYS)[number];

export const COUNT_GROUPS = [
  'storage',
  'hydrogenEngines',
  'reactors',
  'batteries',
  'jumpDrives',
  'generators',
  'hydrogenTanks',
] as const;
export type CountGroup = (typeof COUNT_GROUPS)[number];

/** Where a model keeps an item's count: one of the count groups, or the per-direction thruster maps */
export type CountSlot = CountGroup | 'directional';

/** Absent key ≡ count 0. */
export type CountMap = Record<CatalogItemId, number>;

export type DirectionalCounts = Record<Direction, CountMap>;

export type GridModel = {
  scalars: Record<ScalarKey, number>;
  counts: Record<CountGroup, CountMap>;
  directional: DirectionalCounts;
};

// ─────────────────────────────────────────────────────────────────────────
// Derived Output Snapshot
// ─────────────────────────────────────────────────────────────────────────

export type TierFigures = { consumption: number; balance: number; duration: number };

export type AxisFigures = {
  force: number;
  accelerationEmptyNoGravity: number;
  accelerationFilledNoGravity: number;
  accelerationEmptyGravity: number;
  accelerationFilledGravity: number;
};

export const POWER_TIERS = [
  'idle',
  'misc',
  'uptoJumpDrive',
  'uptoGenerator',
  'uptoUpDownThruster',
  'uptoFrontBackThruster',
  'uptoLeftRightThruster',
  'uptoBattery',
] as const;
export type PowerTier = (typeof POWER_TIERS)[number];

export const HYDROGEN_TIERS = [
  'idle',
  'engine',
  'uptoUpDownThruster',
  'uptoFrontBackThruster',
  'uptoLeftRightThruster',
] as const;
export type HydrogenTier = (typeof HYDROGEN_TIERS)[number];

export type GridOutputs = {
  volume: { any: number; ore: number; ice: number; oreOnly: number; iceOnly: number };
  mass: { empty: number; filled: number };
  items: { ice: number; ore: number; steelPlates: number };
  thrust: Record<Direction, AxisFigures>;
  power: {
    generation: number;
    capacityBattery: number;
    tiers: Record<PowerTier, TierFigures>;
  };
  hydrogen: {
    generation: number;
    capacityEngine: number;
    capacityTank: number;
    tiers: Record<HydrogenTier, TierFigures>;
  };
};

/** Dotted path into a flattened {@link GridOutputs}, e.g. `thrust.up.force`. */
export type OutputKey = string;
