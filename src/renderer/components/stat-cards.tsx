// StatCards: headline metric grid

/** Shared color palette for stat card values */
export const STAT_COLORS = {
  BLUE: '#1565C0',
  PURPLE: '#7B1FA2',
  GREEN: '#2E7D32',
  TEAL: '#00838F',
  ORANGE: '#E65100'
} as const;

export interface Stat {
  label: string;
  value: string | number;
  description: string;
  color?: string;
}

export function StatCards({ stats }: { stats: Stat[] }) {
  return (
    <div class="stat-cards" style={{ gridTemplateColumns: `repeat(${stats.length}, 1fr)` }}>
      {stats.map((stat) => (
        <div class="stat-card" key={stat.label}>
          <div class="stat-card-label">{stat.label}</div>
          <div class="stat-card-value" style={{ color: stat.color || '#666' }}>
            {stat.value}
          </div>
          <div class="stat-card-desc">{stat.description}</div>
        </div>
      ))}
    </div>
  );
}
