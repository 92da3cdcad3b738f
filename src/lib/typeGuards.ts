import type { SizeClass } from '@/types/grid';

/**
 * Type guards for narrowing unknown values read from JSON (catalog data,
 * saved documents) before they are trusted.
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function isFiniteNumber(x: unknown): x is number {
  return typeof x === 'number' && Number.isFinite(x);
}

export function isSizeClass(x: unknown): x is SizeClass {
  return x === 'small' || x === 'large';
}

/**
 * Checks that every listed key of `x` holds a finite number.
 *
 * @example
 * if (!hasNumbers(details, ['capacity'])) return false;
 */
export function hasNumbers(x: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.every((k) => isFiniteNumber(x[k]));
}
