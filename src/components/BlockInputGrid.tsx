import type { BlockRow } from '@/state/bindings.collections';
import type { LayoutSection } from '@/state/bindings.registry';
import { DIRECTIONS, type SizeClass } from '@/types/grid';
import { FieldInput } from './FieldInput';

const SIZE_TITLES: Record<SizeClass, string> = { small: 'Small Grid', large: 'Large Grid' };

function BlockTable({ size, rows, directional }: { size: SizeClass; rows: readonly BlockRow[]; directional: boolean }) {
  if (rows.length === 0) return null;
  return (
    <table className="block-table" data-size={size}>
      <thead>
        <tr>
          <th>{SIZE_TITLES[size]}</th>
          {directional ? DIRECTIONS.map((d) => <th key={d}>{d}</th>) : <th>Count</th>}
        </tr>
      </thead>
      <tbody>
        {rows.map((row) => (
          <tr key={row.itemId}>
            <th scope="row">{row.name}</th>
            {row.fields.map((id, i) => (
              <td key={id}>
                <FieldInput id={id} label={directional ? `${row.name} ${DIRECTIONS[i]}` : row.name} />
              </td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}

/** Count inputs of one layout section, small blocks then large blocks */
export function BlockInputGrid({ section }: { section: LayoutSection }) {
  return (
    <section className="block-grid" data-section={section.key}>
      <h2>{section.title}</h2>
      <BlockTable size="small" rows={section.small} directional={section.directional} />
      <BlockTable size="large" rows={section.large} directional={section.directional} />
    </section>
  );
}
