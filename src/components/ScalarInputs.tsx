import { SCALAR_FIELDS } from '@/constants/scalarFields';
import { scalarFieldId } from '@/state/bindings.fields';
import { FieldInput } from './FieldInput';

export function ScalarInputs() {
  return (
    <fieldset className="scalar-inputs">
      <legend>Parameters</legend>
      {SCALAR_FIELDS.map((spec) => (
        <label key={spec.key} className="scalar-row">
          <span>{spec.label}</span>
          <FieldInput id={scalarFieldId(spec.key)} label={spec.label} placeholder={spec.default.toFixed(spec.precision)} />
          <span className="unit">{spec.unit}</span>
        </label>
      ))}
    </fieldset>
  );
}
