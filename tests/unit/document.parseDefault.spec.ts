import { describe, it, expect } from 'vitest';
import { SCALAR_FIELDS } from '../../src/constants/scalarFields';
import { countFieldId, scalarFieldId, thrustFieldId } from '../../src/state/bindings.fields';
import type { ScalarKey } from '../../src/types/grid';
import { createTestDocument } from '../utils/testDocument';

describe('unparseable field text', () => {
  it.each(SCALAR_FIELDS.map((spec): [ScalarKey, number] => [spec.key, spec.default]))(
    'stores the default of %s, not the previous value',
    (key, fallback) => {
      const { store } = createTestDocument();
      const id = scalarFieldId(key);
      store.getState().editField(id, '42.5');
      expect(store.getState().model.scalars[key]).toBe(42.5);

      store.getState().editField(id, 'abc');
      expect(store.getState().model.scalars[key]).toBe(fallback);
      // the field keeps what was typed
      expect(store.getState().fields[id]).toBe('abc');
    }
  );

  it('treats empty scalar text as the default', () => {
    const { store } = createTestDocument();
    store.getState().editField(scalarFieldId('oreOnlyFill'), '');
    expect(store.getState().model.scalars.oreOnlyFill).toBe(100);
  });

  it('stores zero for unparseable counts', () => {
    const { store } = createTestDocument();
    store.getState().editField(countFieldId('reactors', 'core.r'), '3');
    store.getState().editField(countFieldId('reactors', 'core.r'), 'three');
    expect(store.getState().model.counts.reactors).toEqual({ 'core.r': 0 });

    store.getState().editField(thrustFieldId('back', 'jet.h'), '-2');
    expect(store.getState().model.directional.back).toEqual({ 'jet.h': 0 });
  });
});
