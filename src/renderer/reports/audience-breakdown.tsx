import type { CategoryShare } from '../../types';
import { BarCell } from '../components/bar-cell';
import { DataTable } from '../components/data-table';
import { formatCount, formatShare } from '../format-utils';

const AUDIENCE_COLORS = ['#667eea', '#764ba2', '#f093fb', '#4facfe', '#00f2fe', '#6bcf7f', '#ffa726'];

export function AudienceBreakdown({ entries }: { entries: CategoryShare[] }) {
  return (
    <section class="report-section">
      <h3>Target Audience Distribution</h3>
      <DataTable columns={['Target Audience', 'Entries', 'Share']} numericColumns={[1]} rowCount={entries.length} emptyMessage="No audiences">
        {entries.map((e, i) => (
          <tr key={e.label}>
            <td>{e.label}</td>
            <td class="num">{formatCount(e.count)}</td>
            <BarCell value={e.share} max={1} label={formatShare(e.share)} color={AUDIENCE_COLORS[i % AUDIENCE_COLORS.length]} />
          </tr>
        ))}
      </DataTable>
    </section>
  );
}
