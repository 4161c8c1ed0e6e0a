import type { CanonicalRecord } from '../../types';
import { DataTable } from '../components/data-table';
import { formatDate } from '../format-utils';

/** Filtered raw records, newest first */
export function RawData({ records }: { records: CanonicalRecord[] }) {
  return (
    <section class="report-section">
      <h3>Raw Data ({records.length} entries)</h3>
      <DataTable
        columns={['Date', 'Program', 'Participants', 'Satisfaction', 'Category']}
        numericColumns={[2, 3]}
        className="table-compact"
        rowCount={records.length}
        emptyMessage="No entries match the filters"
      >
        {records.map((r, i) => (
          <tr key={i}>
            <td>{formatDate(r.date)}</td>
            <td>{r.program}</td>
            <td class="num">{r.participants}</td>
            <td class="num">{r.satisfaction}</td>
            <td>{r.category}</td>
          </tr>
        ))}
      </DataTable>
    </section>
  );
}
