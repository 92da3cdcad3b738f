import { SCALAR_FIELDS } from '@/constants/scalarFields';
import type { Catalog } from '@/core/catalog/catalog';
import { formatCount } from '@/lib/format';
import { COUNT_GROUPS, DIRECTIONS, type CountGroup, type Direction, type GridModel } from '@/types/grid';
import {
  bindDirectional,
  bindMany,
  type BindableItem,
  type CountBinding,
  type DirectionalBinding,
  type ItemLookup,
  type RowsBySize,
} from './bindings.collections';
import { bindScalar, type FieldId, type ScalarBinding } from './bindings.fields';

export type FieldBinding = ScalarBinding | CountBinding | DirectionalBinding;

export type SectionKey = 'volumeMass' | 'acceleration' | 'power' | 'hydrogen';

export type LayoutSection = {
  key: SectionKey;
  title: string;
  directional: boolean;
} & RowsBySize;

export class UnknownFieldError extends Error {
  constructor(readonly fieldId: FieldId) {
    super(`Unknown field "${fieldId}"`);
    this.name = 'UnknownFieldError';
  }
}

type CountPart = { group: CountGroup; items: (catalog: Catalog) => readonly BindableItem[] };

type SectionDef =
  | { key: SectionKey; title: string; directional: false; parts: readonly CountPart[] }
  | { key: SectionKey; title: string; directional: true; items: (catalog: Catalog) => readonly BindableItem[] };

/** Grid sections, in display order. Parts of a section are appended one after the other. */
const SECTIONS: readonly SectionDef[] = [
  {
    key: 'volumeMass',
    title: 'Volume & Mass',
    directional: false,
    parts: [
      { group: 'storage', items: (c) => c.group('containers') },
      { group: 'storage', items: (c) => c.group('cockpits').filter((item) => item.details.hasInventory) },
    ],
  },
  { key: 'acceleration', title: 'Force & Acceleration', directional: true, items: (c) => c.group('thrusters') },
  {
    key: 'power',
    title: 'Power',
    directional: false,
    parts: [
      { group: 'hydrogenEngines', items: (c) => c.group('hydrogenEngines') },
      { group: 'reactors', items: (c) => c.group('reactors') },
      { group: 'batteries', items: (c) => c.group('batteries') },
      { group: 'jumpDrives', items: (c) => c.group('jumpDrives') },
    ],
  },
  {
    key: 'hydrogen',
    title: 'Hydrogen',
    directional: false,
    parts: [
      { group: 'generators', items: (c) => c.group('generators') },
      { group: 'hydrogenTanks', items: (c) => c.group('hydrogenTanks') },
    ],
  },
];

/**
 * Every bound field of a document, keyed by id, plus the lookup tables
 * used by the batched refresh after a load.
 */
export class FieldRegistry {
  private readonly records = new Map<FieldId, FieldBinding>();
  private readonly scalars: ScalarBinding[] = [];
  private readonly collectionIds: FieldId[] = [];
  readonly countLookup: Record<CountGroup, ItemLookup> = {
    storage: new Map(),
    hydrogenEngines: new Map(),
    reactors: new Map(),
    batteries: new Map(),
    jumpDrives: new Map(),
    generators: new Map(),
    hydrogenTanks: new Map(),
  };
  readonly directionalLookup: Record<Direction, ItemLookup> = {
    up: new Map(),
    down: new Map(),
    front: new Map(),
    back: new Map(),
    left: new Map(),
    right: new Map(),
  };
  readonly sections: LayoutSection[] = [];

  constructor(catalog: Catalog) {
    for (const spec of SCALAR_FIELDS) {
      const binding = bindScalar(spec);
      this.add(binding);
      this.scalars.push(binding);
    }

    for (const def of SECTIONS) {
      const section: LayoutSection = { key: def.key, title: def.title, directional: def.directional, small: [], large: [] };
      if (def.directional) {
        const { bindings, rows } = bindDirectional(def.items(catalog), this.directionalLookup);
        this.addCollection(bindings);
        section.small.push(...rows.small);
        section.large.push(...rows.large);
      } else {
        for (const part of def.parts) {
          const { bindings, rows } = bindMany(part.items(catalog), part.group, this.countLookup[part.group]);
          this.addCollection(bindings);
          section.small.push(...rows.small);
          section.large.push(...rows.large);
        }
      }
      this.sections.push(section);
    }
  }

  private add(binding: FieldBinding): void {
    if (this.records.has(binding.id)) throw new Error(`Field "${binding.id}" is bound twice`);
    this.records.set(binding.id, binding);
  }

  private addCollection(bindings: readonly (CountBinding | DirectionalBinding)[]): void {
    for (const binding of bindings) {
      this.add(binding);
      this.collectionIds.push(binding.id);
    }
  }

  has(id: FieldId): boolean {
    return this.records.has(id);
  }

  ids(): FieldId[] {
    return [...this.records.keys()];
  }

  /** Parse `text` through the field's binding and store the value in `model`. */
  write(model: GridModel, id: FieldId, text: string): void {
    const binding = this.records.get(id);
    if (!binding) throw new UnknownFieldError(id);
    binding.write(model, text);
  }

  /**
   * Rewrite every field text from `model`. Scalars show two decimals;
   * collection fields are blanked, then filled from the model's counts.
   * Ids without a field are skipped.
   */
  refresh(fields: Record<FieldId, string>, model: GridModel): void {
    for (const binding of this.scalars) fields[binding.id] = binding.read(model);
    for (const id of this.collectionIds) fields[id] = '';

    for (const group of COUNT_GROUPS) {
      const lookup = this.countLookup[group];
      for (const [itemId, n] of Object.entries(model.counts[group])) {
        const id = lookup.get(itemId);
        if (id) fields[id] = formatCount(n);
      }
    }
    for (const direction of DIRECTIONS) {
      const lookup = this.directionalLookup[direction];
      for (const [itemId, n] of Object.entries(model.directional[direction])) {
        const id = lookup.get(itemId);
        if (id) fields[id] = formatCount(n);
      }
    }
  }

  /** Field texts for a freshly created document */
  initialFields(model: GridModel): Record<FieldId, string> {
    const fields: Record<FieldId, string> = {};
    this.refresh(fields, model);
    return fields;
  }
}
