import type { OutputRow, OutputTableDef } from '@/constants/outputs';
import { formatOutput } from '@/lib/format';
import { useDocument } from '@/state/DocumentContext';

function OutputCell({ row, decimals }: { row: OutputRow; decimals: number }) {
  const value = useDocument((s) => s.outputs[row.key]);
  return (
    <tr>
      <th scope="row">{row.label}</th>
      <td data-output={row.key}>{value === undefined ? '' : formatOutput(value, decimals)}</td>
      <td className="unit">{row.unit}</td>
    </tr>
  );
}

export function OutputTable({ table, decimals = 2 }: { table: OutputTableDef; decimals?: number }) {
  return (
    <table className="output-table">
      <caption>{table.title}</caption>
      <tbody>
        {table.rows.map((row) => (
          <OutputCell key={row.key} row={row} decimals={decimals} />
        ))}
      </tbody>
    </table>
  );
}
