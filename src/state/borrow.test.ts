import { describe, it, expect } from 'vitest';
import { BorrowError, DocumentBorrow } from './borrow';

describe('DocumentBorrow', () => {
  it('returns the callback result and releases the borrow', () => {
    const borrow = new DocumentBorrow();
    expect(borrow.read(() => 42)).toBe(42);
    expect(borrow.current).toBeNull();
    expect(borrow.write(() => 'done')).toBe('done');
    expect(borrow.current).toBeNull();
  });

  it('reports the mode held inside the callback', () => {
    const borrow = new DocumentBorrow();
    expect(borrow.write(() => borrow.current)).toBe('write');
  });

  it('rejects a write while reading', () => {
    const borrow = new DocumentBorrow();
    expect(() => borrow.read(() => borrow.write(() => undefined))).toThrow(
      new BorrowError('write', 'read')
    );
  });

  it('rejects any borrow while writing', () => {
    const borrow = new DocumentBorrow();
    expect(() => borrow.write(() => borrow.read(() => undefined))).toThrow(
      'Cannot take a read borrow while a write borrow is outstanding'
    );
  });

  it('releases the borrow when the callback throws', () => {
    const borrow = new DocumentBorrow();
    expect(() =>
      borrow.write(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(borrow.current).toBeNull();
    expect(borrow.read(() => 1)).toBe(1);
  });
});
