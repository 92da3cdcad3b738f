import { describe, it, expect, vi } from 'vitest';
import { gridCalculator } from '@/core/calculator/gridCalculator';
import type { ModelCalculator } from '@/core/contracts/calculator';
import { createRecordingSink, createTestDocument } from '../../tests/utils/testDocument';
import { countFieldId, scalarFieldId } from './bindings.fields';
import { UnknownFieldError } from './bindings.registry';

function countingCalculator() {
  const calculate = vi.fn(gridCalculator.calculate);
  const calculator: ModelCalculator = { ...gridCalculator, calculate };
  return { calculator, calculate };
}

describe('createDocumentStore', () => {
  it('starts from the default model with formatted fields', () => {
    const { store } = createTestDocument();
    const s = store.getState();
    expect(s.model).toEqual(gridCalculator.createDefault());
    expect(s.fields[scalarFieldId('iceOnlyFill')]).toBe('100.00');
    expect(s.fields[countFieldId('storage', 'crate.a')]).toBe('');
  });

  it('recalculates once on creation', () => {
    const { calculator, calculate } = countingCalculator();
    const { store } = createTestDocument({ calculator });
    expect(calculate).toHaveBeenCalledTimes(1);
    expect(store.getState().revision).toBe(1);
    expect(store.getState().outputs['mass.empty']).toBe(0);
  });

  it('pushes outputs to sinks given at creation', () => {
    const { sink, last } = createRecordingSink();
    createTestDocument({ sinks: [sink] });
    expect(last('thrust.up.accelerationEmptyGravity')).toBe(-9.81);
  });

  it('keeps documents independent', () => {
    const a = createTestDocument();
    const b = createTestDocument();
    a.store.getState().editField(countFieldId('storage', 'crate.a'), '2');
    expect(b.store.getState().model.counts.storage).toEqual({});
    expect(b.store.getState().outputs['mass.empty']).toBe(0);
  });
});

describe('editField', () => {
  it('updates text, model and outputs', () => {
    const { store } = createTestDocument();
    store.getState().editField(countFieldId('storage', 'crate.a'), '4');

    const s = store.getState();
    expect(s.fields[countFieldId('storage', 'crate.a')]).toBe('4');
    expect(s.model.counts.storage).toEqual({ 'crate.a': 4 });
    expect(s.outputs['mass.empty']).toBe(40);
    expect(s.outputs['volume.any']).toBe(400);
  });

  it('throws for an unknown field without touching the document', () => {
    const { calculator, calculate } = countingCalculator();
    const { store } = createTestDocument({ calculator });
    const before = store.getState();
    expect(() => store.getState().editField('scalar.nope', '1')).toThrow(UnknownFieldError);
    expect(store.getState()).toBe(before);
    expect(calculate).toHaveBeenCalledTimes(1);
  });
});

describe('attachSink', () => {
  it('pushes the latest outputs at once and after each edit', () => {
    const { store } = createTestDocument();
    const { sink, updates, last } = createRecordingSink();
    store.getState().attachSink(sink);
    expect(updates).toHaveLength(84);

    store.getState().editField(scalarFieldId('additionalMass'), '250');
    expect(last('mass.empty')).toBe(250);
    expect(updates).toHaveLength(168);
  });

  it('stops pushing after detach', () => {
    const { store } = createTestDocument();
    const { sink, updates } = createRecordingSink();
    const detach = store.getState().attachSink(sink);
    detach();
    store.getState().editField(scalarFieldId('additionalMass'), '1');
    expect(updates).toHaveLength(84);
  });
});
