import { useDocument } from '@/state/DocumentContext';
import type { FieldId } from '@/state/bindings.fields';

type Props = {
  id: FieldId;
  label: string;
  placeholder?: string;
};

/** Text input bound to one document field */
export function FieldInput({ id, label, placeholder }: Props) {
  const text = useDocument((s) => s.fields[id] ?? '');
  const editField = useDocument((s) => s.editField);

  return (
    <input
      type="text"
      inputMode="decimal"
      aria-label={label}
      data-field={id}
      value={text}
      placeholder={placeholder}
      onChange={(e) => editField(id, e.target.value)}
    />
  );
}
