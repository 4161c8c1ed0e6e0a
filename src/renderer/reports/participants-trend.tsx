import type { TrendPoint } from '../../types';
import { BarCell } from '../components/bar-cell';
import { DataTable } from '../components/data-table';
import { formatCount } from '../format-utils';

/** Participants per month, oldest first */
export function ParticipantsTrend({ points }: { points: TrendPoint[] }) {
  const max = points.reduce((m, p) => Math.max(m, p.participants), 0);
  return (
    <section class="report-section">
      <h3>Participants Trend Over Time</h3>
      <DataTable columns={['Month', 'Participants']} rowCount={points.length} emptyMessage="No dated entries.">
        {points.map((p) => (
          <tr key={p.month}>
            <td>{p.month}</td>
            <BarCell value={p.participants} max={max} label={formatCount(p.participants)} />
          </tr>
        ))}
      </DataTable>
    </section>
  );
}
