import type { LabelCount } from '../../types';
import { BarCell } from '../components/bar-cell';
import { DataTable } from '../components/data-table';
import { formatCount } from '../format-utils';

/** Top programs by number of entries */
export function ProgramDistribution({ entries, limit }: { entries: LabelCount[]; limit: number }) {
  const max = entries.reduce((m, e) => Math.max(m, e.count), 0);
  return (
    <section class="report-section">
      <h3>Top {limit} Programs by Frequency</h3>
      <DataTable columns={['Program', 'Number of Entries']} rowCount={entries.length} emptyMessage="No programs">
        {entries.map((e) => (
          <tr key={e.label}>
            <td>{e.label}</td>
            <BarCell value={e.count} max={max} label={formatCount(e.count)} />
          </tr>
        ))}
      </DataTable>
    </section>
  );
}
