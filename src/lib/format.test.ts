import { describe, it, expect } from 'vitest';
import { formatCount, formatOutput, formatScalar, parseCount, parseScalar } from './format';

describe('parseScalar', () => {
  it('parses plain decimals', () => {
    expect(parseScalar('1.5', 9)).toBe(1.5);
    expect(parseScalar('-2', 9)).toBe(-2);
    expect(parseScalar('.5', 9)).toBe(0.5);
    expect(parseScalar('5.', 9)).toBe(5);
    expect(parseScalar('1e3', 9)).toBe(1000);
  });

  it('returns the fallback for empty or malformed text', () => {
    expect(parseScalar('', 7)).toBe(7);
    expect(parseScalar('abc', 7)).toBe(7);
    expect(parseScalar('1.5x', 7)).toBe(7);
    expect(parseScalar(' 1.5', 7)).toBe(7);
  });

  it('rejects non-finite values', () => {
    expect(parseScalar('Infinity', 7)).toBe(7);
    expect(parseScalar('NaN', 7)).toBe(7);
    expect(parseScalar('1e400', 7)).toBe(7);
  });
});

describe('parseCount', () => {
  it('parses non-negative integers', () => {
    expect(parseCount('3')).toBe(3);
    expect(parseCount('+4')).toBe(4);
    expect(parseCount('0')).toBe(0);
  });

  it('falls back to 0 by default', () => {
    expect(parseCount('')).toBe(0);
    expect(parseCount('-1')).toBe(0);
    expect(parseCount('1.5')).toBe(0);
    expect(parseCount('99999999999999999999')).toBe(0);
  });

  it('honours an explicit fallback', () => {
    expect(parseCount('abc', 9)).toBe(9);
  });
});

describe('formatting', () => {
  it('formats scalars with two decimals and counts as integers', () => {
    expect(formatScalar(1)).toBe('1.00');
    expect(formatScalar(2.5)).toBe('2.50');
    expect(formatCount(12)).toBe('12');
  });

  it('formats derived values', () => {
    expect(formatOutput(2)).toBe('2.00');
    expect(formatOutput(1.23456, 3)).toBe('1.235');
    expect(formatOutput(Infinity)).toBe('∞');
    expect(formatOutput(-Infinity)).toBe('-∞');
    expect(formatOutput(NaN)).toBe('—');
  });
});
