import type { ScalarFieldSpec } from '@/constants/scalarFields';
import { formatScalar, parseScalar } from '@/lib/format';
import type { CatalogItemId, CountGroup, Direction, GridModel, ScalarKey } from '@/types/grid';

/** Stable key of one bound text field */
export type FieldId = string;

export const scalarFieldId = (key: ScalarKey): FieldId => `scalar.${key}`;
export const countFieldId = (group: CountGroup, itemId: CatalogItemId): FieldId => `count.${group}.${itemId}`;
export const thrustFieldId = (direction: Direction, itemId: CatalogItemId): FieldId => `thrust.${direction}.${itemId}`;

export type ScalarBinding = {
  id: FieldId;
  kind: 'scalar';
  spec: ScalarFieldSpec;
  /** Parse-or-default, then store into the model */
  write: (model: GridModel, text: string) => void;
  /** Text shown after a refresh */
  read: (model: GridModel) => string;
};

/**
 * Bind one scalar parameter. Unparseable text stores the row default,
 * never the previous value.
 */
export function bindScalar(spec: ScalarFieldSpec): ScalarBinding {
  return {
    id: scalarFieldId(spec.key),
    kind: 'scalar',
    spec,
    write: (model, text) => {
      model.scalars[spec.key] = parseScalar(text, spec.default);
    },
    read: (model) => formatScalar(model.scalars[spec.key]),
  };
}
