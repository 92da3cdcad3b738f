import { DIRECTIONS, HYDROGEN_TIERS, POWER_TIERS, type Direction, type HydrogenTier, type OutputKey, type PowerTier } from '@/types/grid';

export type OutputRow = { key: OutputKey; label: string; unit: string };

export type OutputTableDef = {
  title: string;
  rows: OutputRow[];
};

const DIRECTION_LABELS: Record<Direction, string> = {
  up: 'Up',
  down: 'Down',
  front: 'Front',
  back: 'Back',
  left: 'Left',
  right: 'Right',
};

const POWER_TIER_LABELS: Record<PowerTier, string> = {
  idle: 'Idle',
  misc: 'Misc',
  uptoJumpDrive: '+ Jump Drive',
  uptoGenerator: '+ Generator',
  uptoUpDownThruster: '+ Up/Down Thruster',
  uptoFrontBackThruster: '+ Front/Back Thruster',
  uptoLeftRightThruster: '+ Left/Right Thruster',
  uptoBattery: '+ Battery',
};

const HYDROGEN_TIER_LABELS: Record<HydrogenTier, string> = {
  idle: 'Idle',
  engine: '+ Engine',
  uptoUpDownThruster: '+ Up/Down Thruster',
  uptoFrontBackThruster: '+ Front/Back Thruster',
  uptoLeftRightThruster: '+ Left/Right Thruster',
};

const tierRows = (prefix: string, label: string, unit: string, durationUnit: string): OutputRow[] => [
  { key: `${prefix}.consumption`, label: `${label} consumption`, unit },
  { key: `${prefix}.balance`, label: `${label} balance`, unit },
  { key: `${prefix}.duration`, label: `${label} duration`, unit: durationUnit },
];

/** Output tables in display order */
export const OUTPUT_TABLES: readonly OutputTableDef[] = [
  {
    title: 'Volume',
    rows: [
      { key: 'volume.any', label: 'Any', unit: 'L' },
      { key: 'volume.ore', label: 'Ore in any', unit: 'L' },
      { key: 'volume.ice', label: 'Ice in any', unit: 'L' },
      { key: 'volume.oreOnly', label: 'Ore-only', unit: 'L' },
      { key: 'volume.iceOnly', label: 'Ice-only', unit: 'L' },
    ],
  },
  {
    title: 'Mass & Items',
    rows: [
      { key: 'mass.empty', label: 'Empty mass', unit: 'kg' },
      { key: 'mass.filled', label: 'Filled mass', unit: 'kg' },
      { key: 'items.ice', label: 'Ice', unit: '#' },
      { key: 'items.ore', label: 'Ore', unit: '#' },
      { key: 'items.steelPlates', label: 'Steel Plates', unit: '#' },
    ],
  },
  {
    title: 'Force & Acceleration',
    rows: DIRECTIONS.flatMap((dir) => [
      { key: `thrust.${dir}.force`, label: `${DIRECTION_LABELS[dir]} force`, unit: 'N' },
      { key: `thrust.${dir}.accelerationEmptyNoGravity`, label: `${DIRECTION_LABELS[dir]} empty`, unit: 'm/s²' },
      { key: `thrust.${dir}.accelerationFilledNoGravity`, label: `${DIRECTION_LABELS[dir]} filled`, unit: 'm/s²' },
      { key: `thrust.${dir}.accelerationEmptyGravity`, label: `${DIRECTION_LABELS[dir]} empty, gravity`, unit: 'm/s²' },
      { key: `thrust.${dir}.accelerationFilledGravity`, label: `${DIRECTION_LABELS[dir]} filled, gravity`, unit: 'm/s²' },
    ]),
  },
  {
    title: 'Power',
    rows: [
      { key: 'power.generation', label: 'Generation', unit: 'MW' },
      { key: 'power.capacityBattery', label: 'Battery capacity', unit: 'MWh' },
      ...POWER_TIERS.flatMap((tier) => tierRows(`power.tiers.${tier}`, POWER_TIER_LABELS[tier], 'MW', 'min')),
    ],
  },
  {
    title: 'Hydrogen',
    rows: [
      { key: 'hydrogen.generation', label: 'Generation', unit: 'L/s' },
      { key: 'hydrogen.capacityEngine', label: 'Engine capacity', unit: 'L' },
      { key: 'hydrogen.capacityTank', label: 'Tank capacity', unit: 'L' },
      ...HYDROGEN_TIERS.flatMap((tier) => tierRows(`hydrogen.tiers.${tier}`, HYDROGEN_TIER_LABELS[tier], 'L/s', 'min')),
    ],
  },
];
