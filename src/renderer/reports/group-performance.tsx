import type { GroupAggregate } from '../../types';
import { DataTable } from '../components/data-table';
import { formatCount, formatMean } from '../format-utils';

/** Ranked participants and mean satisfaction per program or audience */
export function GroupPerformance({ title, keyLabel, groups }: { title: string; keyLabel: string; groups: GroupAggregate[] }) {
  return (
    <section class="report-section">
      <h3>{title}</h3>
      <DataTable
        columns={[keyLabel, 'Entries', 'Participants', 'Avg Satisfaction']}
        numericColumns={[1, 2, 3]}
        rowCount={groups.length}
        emptyMessage="No data"
      >
        {groups.map((g) => (
          <tr key={g.key}>
            <td>{g.key}</td>
            <td class="num">{formatCount(g.count)}</td>
            <td class="num">{formatCount(g.participantsSum)}</td>
            <td class="num">{formatMean(g.satisfactionMean)}</td>
          </tr>
        ))}
      </DataTable>
    </section>
  );
}
