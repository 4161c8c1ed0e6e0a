// BarCell: inline horizontal bar used for the chart-style tables

import { barWidth } from '../format-utils';

export function BarCell({ value, max, label, color }: { value: number; max: number; label: string; color?: string }) {
  return (
    <td class="bar-cell">
      <div class="bar" style={{ width: barWidth(value, max), background: color || '#667eea' }} />
      <span class="bar-label">{label}</span>
    </td>
  );
}
