import { smallAndLargeSorted } from '@/core/catalog/catalog';
import { parseCount } from '@/lib/format';
import { DIRECTIONS, type CatalogItemId, type CountGroup, type Direction, type GridModel, type SizeClass } from '@/types/grid';
import { countFieldId, thrustFieldId, type FieldId } from './bindings.fields';

export type BindableItem = { id: CatalogItemId; name: string; size: SizeClass };

export type CountBinding = {
  id: FieldId;
  kind: 'count';
  group: CountGroup;
  itemId: CatalogItemId;
  write: (model: GridModel, text: string) => void;
};

export type DirectionalBinding = {
  id: FieldId;
  kind: 'directional';
  direction: Direction;
  itemId: CatalogItemId;
  write: (model: GridModel, text: string) => void;
};

/** One catalog item in a layout table: one field, or one per direction (in `DIRECTIONS` order). */
export type BlockRow = { itemId: CatalogItemId; name: string; fields: FieldId[] };

export type RowsBySize = Record<SizeClass, BlockRow[]>;

export type ItemLookup = Map<CatalogItemId, FieldId>;

/**
 * One count field per catalog item, all writing into `counts[group]`.
 * A zero count is stored as a present key.
 */
export function bindMany(
  items: readonly BindableItem[],
  group: CountGroup,
  lookup: ItemLookup
): { bindings: CountBinding[]; rows: RowsBySize } {
  const bindings: CountBinding[] = [];
  const sorted = smallAndLargeSorted(items);

  const toRow = (item: BindableItem): BlockRow => {
    const id = countFieldId(group, item.id);
    bindings.push({
      id,
      kind: 'count',
      group,
      itemId: item.id,
      write: (model, text) => {
        model.counts[group][item.id] = parseCount(text);
      },
    });
    lookup.set(item.id, id);
    return { itemId: item.id, name: item.name, fields: [id] };
  };

  return { bindings, rows: { small: sorted.small.map(toRow), large: sorted.large.map(toRow) } };
}

/**
 * Six count fields per catalog item, each writing the item's count in the
 * map of its own direction. Each direction keeps its own lookup table.
 */
export function bindDirectional(
  items: readonly BindableItem[],
  lookups: Record<Direction, ItemLookup>
): { bindings: DirectionalBinding[]; rows: RowsBySize } {
  const bindings: DirectionalBinding[] = [];
  const sorted = smallAndLargeSorted(items);

  const toRow = (item: BindableItem): BlockRow => {
    const fields = DIRECTIONS.map((direction) => {
      const id = thrustFieldId(direction, item.id);
      bindings.push({
        id,
        kind: 'directional',
        direction,
        itemId: item.id,
        write: (model, text) => {
          model.directional[direction][item.id] = parseCount(text);
        },
      });
      lookups[direction].set(item.id, id);
      return id;
    });
    return { itemId: item.id, name: item.name, fields };
  };

  return { bindings, rows: { small: sorted.small.map(toRow), large: sorted.large.map(toRow) } };
}
