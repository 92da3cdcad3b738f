import catalogJson from '@/data/catalog.json';
import { hasNumbers, isRecord, isSizeClass } from '@/lib/typeGuards';
import type {
  BatteryDetails,
  CatalogData,
  CatalogGroup,
  CatalogItem,
  CatalogItemId,
  CockpitDetails,
  ContainerDetails,
  CountSlot,
  GeneratorDetails,
  HydrogenEngineDetails,
  HydrogenTankDetails,
  JumpDriveDetails,
  ReactorDetails,
  ThrusterDetails,
} from '@/types/grid';

export type AnyCatalogItem = CatalogData[CatalogGroup][number];

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

// ─────────────────────────────────────────────────────────────────────────
// Detail guards (one per group)
// ─────────────────────────────────────────────────────────────────────────

function isContainerDetails(x: unknown): x is ContainerDetails {
  return isRecord(x) && hasNumbers(x, ['capacity']) && (x.store === 'any' || x.store === 'ore' || x.store === 'ice');
}

function isCockpitDetails(x: unknown): x is CockpitDetails {
  return isRecord(x) && hasNumbers(x, ['capacity']) && typeof x.hasInventory === 'boolean';
}

function isThrusterDetails(x: unknown): x is ThrusterDetails {
  if (!isRecord(x)) return false;
  if (x.type !== 'ion' && x.type !== 'atmospheric' && x.type !== 'hydrogen') return false;
  return hasNumbers(x, ['force', 'powerMax', 'powerIdle', 'hydrogenMax', 'hydrogenIdle']);
}

function isHydrogenEngineDetails(x: unknown): x is HydrogenEngineDetails {
  return isRecord(x) && hasNumbers(x, ['powerOutput', 'fuelCapacity', 'fuelConsumption']);
}

function isReactorDetails(x: unknown): x is ReactorDetails {
  return isRecord(x) && hasNumbers(x, ['powerOutput']);
}

function isBatteryDetails(x: unknown): x is BatteryDetails {
  return isRecord(x) && hasNumbers(x, ['capacity', 'input', 'output']);
}

function isJumpDriveDetails(x: unknown): x is JumpDriveDetails {
  return isRecord(x) && hasNumbers(x, ['powerInput']);
}

function isGeneratorDetails(x: unknown): x is GeneratorDetails {
  return isRecord(x) && hasNumbers(x, ['capacity', 'powerConsumption', 'hydrogenGeneration']);
}

function isHydrogenTankDetails(x: unknown): x is HydrogenTankDetails {
  return isRecord(x) && hasNumbers(x, ['capacity']);
}

function parseGroup<D>(raw: unknown, group: CatalogGroup, isDetails: (x: unknown) => x is D): CatalogItem<D>[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) throw new CatalogError(`Catalog group "${group}" is not an array`);

  return raw.map((entry, index) => {
    if (!isRecord(entry)) throw new CatalogError(`Catalog ${group}[${index}] is not an object`);
    const { id, name, size, mass, details } = entry;
    if (typeof id !== 'string' || id.length === 0) throw new CatalogError(`Catalog ${group}[${index}] has no id`);
    if (typeof name !== 'string') throw new CatalogError(`Catalog item "${id}" has no name`);
    if (!isSizeClass(size)) throw new CatalogError(`Catalog item "${id}" has an invalid size`);
    if (typeof mass !== 'number' || !Number.isFinite(mass)) throw new CatalogError(`Catalog item "${id}" has an invalid mass`);
    if (!isDetails(details)) throw new CatalogError(`Catalog item "${id}" has invalid ${group} details`);
    return { id, name, size, mass, details };
  });
}

/**
 * Read-only catalog of placeable blocks, loaded once before any document
 * store exists.
 */
export class Catalog {
  private readonly byId = new Map<CatalogItemId, AnyCatalogItem>();
  private readonly slotIds = new Map<CountSlot, Set<CatalogItemId>>();

  private constructor(readonly data: Readonly<CatalogData>) {
    for (const group of Object.values(data)) {
      for (const item of group) {
        if (this.byId.has(item.id)) throw new CatalogError(`Duplicate catalog id "${item.id}"`);
        this.byId.set(item.id, item);
      }
    }
  }

  static fromJson(raw: unknown): Catalog {
    if (!isRecord(raw)) throw new CatalogError('Catalog root is not an object');
    return new Catalog({
      containers: parseGroup(raw.containers, 'containers', isContainerDetails),
      cockpits: parseGroup(raw.cockpits, 'cockpits', isCockpitDetails),
      thrusters: parseGroup(raw.thrusters, 'thrusters', isThrusterDetails),
      hydrogenEngines: parseGroup(raw.hydrogenEngines, 'hydrogenEngines', isHydrogenEngineDetails),
      reactors: parseGroup(raw.reactors, 'reactors', isReactorDetails),
      batteries: parseGroup(raw.batteries, 'batteries', isBatteryDetails),
      jumpDrives: parseGroup(raw.jumpDrives, 'jumpDrives', isJumpDriveDetails),
      generators: parseGroup(raw.generators, 'generators', isGeneratorDetails),
      hydrogenTanks: parseGroup(raw.hydrogenTanks, 'hydrogenTanks', isHydrogenTankDetails),
    });
  }

  has(id: CatalogItemId): boolean {
    return this.byId.has(id);
  }

  get(id: CatalogItemId): AnyCatalogItem | undefined {
    return this.byId.get(id);
  }

  group<G extends CatalogGroup>(group: G): CatalogData[G] {
    return this.data[group];
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * Items whose counts a model keeps under `slot`. Storage holds the
   * containers and the cockpits that carry an inventory.
   */
  slotMembers(slot: CountSlot): readonly AnyCatalogItem[] {
    switch (slot) {
      case 'storage':
        return [...this.data.containers, ...this.data.cockpits.filter((c) => c.details.hasInventory)];
      case 'directional':
        return this.data.thrusters;
      default:
        return this.data[slot];
    }
  }

  belongsTo(slot: CountSlot, id: CatalogItemId): boolean {
    let ids = this.slotIds.get(slot);
    if (!ids) {
      ids = new Set(this.slotMembers(slot).map((item) => item.id));
      this.slotIds.set(slot, ids);
    }
    return ids.has(id);
  }
}

function compareItems(a: { name: string; id: string }, b: { name: string; id: string }): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

/**
 * Partition by size class, each class sorted by name then id.
 * Code-unit comparison keeps the order identical across runs and locales.
 */
export function smallAndLargeSorted<T extends { size: 'small' | 'large'; name: string; id: string }>(
  items: readonly T[]
): { small: T[]; large: T[] } {
  const small = items.filter((i) => i.size === 'small').sort(compareItems);
  const large = items.filter((i) => i.size === 'large').sort(compareItems);
  return { small, large };
}

let defaultCatalog: Catalog | null = null;

/** Catalog bundled with the app (`src/data/catalog.json`), parsed on first use. */
export function loadDefaultCatalog(): Catalog {
  if (!defaultCatalog) defaultCatalog = Catalog.fromJson(catalogJson);
  return defaultCatalog;
}
