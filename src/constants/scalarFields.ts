import type { ScalarKey } from '@/types/grid';

export type ScalarFieldSpec = {
  key: ScalarKey;
  /** Substituted when the field text does not parse */
  default: number;
  label: string;
  /** Decimals used for the placeholder shown by presentation */
  precision: number;
  unit: string;
};

export const SCALAR_DEFAULTS: Readonly<Record<ScalarKey, number>> = {
  gravityMultiplier: 1,
  containerMultiplier: 1,
  planetaryInfluence: 1,
  additionalMass: 0,
  iceOnlyFill: 100,
  oreOnlyFill: 100,
  anyFillWithIce: 0,
  anyFillWithOre: 0,
  anyFillWithSteelPlates: 0,
};

/**
 * Declarative table of the editable scalar parameters.
 * Order is the display order.
 */
export const SCALAR_FIELDS: readonly ScalarFieldSpec[] = [
  { key: 'gravityMultiplier', default: SCALAR_DEFAULTS.gravityMultiplier, label: 'Gravity Multiplier', precision: 1, unit: '*' },
  { key: 'containerMultiplier', default: SCALAR_DEFAULTS.containerMultiplier, label: 'Container Multiplier', precision: 1, unit: '*' },
  { key: 'planetaryInfluence', default: SCALAR_DEFAULTS.planetaryInfluence, label: 'Planetary Influence', precision: 1, unit: '*' },
  { key: 'additionalMass', default: SCALAR_DEFAULTS.additionalMass, label: 'Additional Mass', precision: 0, unit: 'kg' },
  { key: 'iceOnlyFill', default: SCALAR_DEFAULTS.iceOnlyFill, label: 'Ice-only-fill', precision: 1, unit: '%' },
  { key: 'oreOnlyFill', default: SCALAR_DEFAULTS.oreOnlyFill, label: 'Ore-only-fill', precision: 1, unit: '%' },
  { key: 'anyFillWithIce', default: SCALAR_DEFAULTS.anyFillWithIce, label: 'Any-fill with Ice', precision: 1, unit: '%' },
  { key: 'anyFillWithOre', default: SCALAR_DEFAULTS.anyFillWithOre, label: 'Any-fill with Ore', precision: 1, unit: '%' },
  {
    key: 'anyFillWithSteelPlates',
    default: SCALAR_DEFAULTS.anyFillWithSteelPlates,
    label: 'Any-fill with Steel Plates',
    precision: 1,
    unit: '%',
  },
];
