/**
 * Parsing and formatting of bound field text.
 *
 * Parsing never fails: text that does not parse yields the caller's
 * fallback, so an edit is always accepted.
 */

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const COUNT_RE = /^\+?\d+$/;

/** Finite decimal number, or `fallback`. Surrounding whitespace is not trimmed. */
export function parseScalar(text: string, fallback: number): number {
  if (!DECIMAL_RE.test(text)) return fallback;
  const v = Number(text);
  return Number.isFinite(v) ? v : fallback;
}

/** Non-negative integer count, or `fallback` (0 unless given). */
export function parseCount(text: string, fallback = 0): number {
  if (!COUNT_RE.test(text)) return fallback;
  const v = Number(text);
  return Number.isSafeInteger(v) ? v : fallback;
}

/** Text written into a scalar field on refresh */
export function formatScalar(value: number): string {
  return value.toFixed(2);
}

/** Text written into a count field on refresh */
export function formatCount(count: number): string {
  return String(count);
}

/**
 * Display text of a derived value. Presentation concern; the store only
 * hands out numbers.
 */
export function formatOutput(value: number, decimals = 2): string {
  if (Number.isNaN(value)) return '—';
  if (value === Infinity) return '∞';
  if (value === -Infinity) return '-∞';
  return value.toFixed(decimals);
}
