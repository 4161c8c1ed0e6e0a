// DataTable: header row, body rows and a placeholder when there are none

import type { ComponentChildren } from 'preact';

interface DataTableProps {
  columns: string[];
  /** Indexes of columns rendered right-aligned */
  numericColumns?: number[];
  className?: string;
  rowCount: number;
  /** Spanning row shown when rowCount is 0 */
  emptyMessage: string;
  children: ComponentChildren;
}

export function DataTable({ columns, numericColumns = [], className, rowCount, emptyMessage, children }: DataTableProps) {
  return (
    <table class={className || 'table-normal'}>
      <thead>
        <tr>
          {columns.map((col, i) => (
            <th key={col} class={numericColumns.includes(i) ? 'num' : undefined}>
              {col}
            </th>
          ))}
        </tr>
      </thead>
      <tbody>
        {rowCount === 0 ? (
          <tr>
            <td class="empty-row" colSpan={columns.length}>
              {emptyMessage}
            </td>
          </tr>
        ) : (
          children
        )}
      </tbody>
    </table>
  );
}
