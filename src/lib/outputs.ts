import type { OutputKey } from '@/types/grid';

export type NumericTree = { readonly [key: string]: number | NumericTree };

export type FlatOutputs = Record<OutputKey, number>;

/**
 * Flatten a nested snapshot into dotted keys, e.g.
 * `{ thrust: { up: { force: 1 } } }` → `{ 'thrust.up.force': 1 }`.
 * Key order follows the snapshot's own property order.
 */
export function flattenOutputs(tree: NumericTree, prefix = '', out: FlatOutputs = {}): FlatOutputs {
  for (const [key, value] of Object.entries(tree)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (typeof value === 'number') {
      out[path] = value;
    } else {
      flattenOutputs(value, path, out);
    }
  }
  return out;
}
