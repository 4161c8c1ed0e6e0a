import type { SatisfactionBucket } from '../../types';
import { BarCell } from '../components/bar-cell';
import { DataTable } from '../components/data-table';
import { formatCount } from '../format-utils';

const SCORE_COLORS: Record<number, string> = {
  1: '#ff6b6b',
  2: '#ffa726',
  3: '#ffd93d',
  4: '#6bcf7f',
  5: '#4ecdc4'
};

export function SatisfactionDistribution({ buckets }: { buckets: SatisfactionBucket[] }) {
  const max = buckets.reduce((m, b) => Math.max(m, b.count), 0);
  return (
    <section class="report-section">
      <h3>Satisfaction Score Distribution</h3>
      <DataTable columns={['Satisfaction Level', 'Count']} rowCount={buckets.length} emptyMessage="No ratings">
        {buckets.map((b) => (
          <tr key={b.score}>
            <td>{b.label}</td>
            <BarCell value={b.count} max={max} label={formatCount(b.count)} color={SCORE_COLORS[b.score]} />
          </tr>
        ))}
      </DataTable>
    </section>
  );
}
