import { describe, it, expect, vi } from 'vitest';
import { gridCalculator } from '../../src/core/calculator/gridCalculator';
import type { ModelCalculator } from '../../src/core/contracts/calculator';
import { countFieldId, scalarFieldId } from '../../src/state/bindings.fields';
import { createRecordingSink, createTestDocument } from '../utils/testDocument';

describe('recalculation after an edit', () => {
  it('runs exactly once per edit, before editField returns', () => {
    const calculate = vi.fn(gridCalculator.calculate);
    const calculator: ModelCalculator = { ...gridCalculator, calculate };
    const { store } = createTestDocument({ calculator });

    store.getState().editField(countFieldId('storage', 'crate.b'), '1');
    expect(calculate).toHaveBeenCalledTimes(2);
    store.getState().editField(countFieldId('storage', 'crate.b'), '2');
    expect(calculate).toHaveBeenCalledTimes(3);
    expect(store.getState().revision).toBe(3);
  });

  it('shows the outputs of the model after the edit', () => {
    const { sink, last } = createRecordingSink();
    const { store, catalog } = createTestDocument({ sinks: [sink] });

    store.getState().editField(countFieldId('storage', 'crate.b'), '2');
    store.getState().editField(scalarFieldId('containerMultiplier'), '3');

    const expected = gridCalculator.calculate(store.getState().model, catalog);
    expect(last('volume.any')).toBe(expected.volume.any);
    expect(last('volume.any')).toBe(1200);
    expect(last('mass.empty')).toBe(40);
  });

  it('recomputes on unchanged text too', () => {
    const { store } = createTestDocument();
    store.getState().editField(scalarFieldId('gravityMultiplier'), '1');
    store.getState().editField(scalarFieldId('gravityMultiplier'), '1');
    expect(store.getState().revision).toBe(3);
  });
});
