// Distributions
// Frequency, audience share, satisfaction and trend series behind the dashboard charts

import { DEFAULT_TOP_N, SATISFACTION_LABELS } from '../../constants';
import type { CanonicalRecord, CategoryShare, LabelCount, SatisfactionBucket, TrendPoint } from '../../types';
import { countBy, sortByCountDesc } from '../utils';
import { aggregate } from './aggregation';

/** Most frequent programs by number of entries */
export function programFrequency(records: readonly CanonicalRecord[], limit: number = DEFAULT_TOP_N): LabelCount[] {
  const counts = countBy(records, (r) => r.program);
  const entries = [...counts].map(([label, count]) => ({ label, count }));
  return sortByCountDesc(entries).slice(0, Math.max(0, limit));
}

/** Entries per target audience with their share of all entries */
export function categoryBreakdown(records: readonly CanonicalRecord[]): CategoryShare[] {
  if (records.length === 0) return [];
  const counts = countBy(records, (r) => r.category);
  const entries = [...counts].map(([label, count]) => ({ label, count, share: count / records.length }));
  return sortByCountDesc(entries);
}

export function satisfactionLabel(score: number): string {
  return SATISFACTION_LABELS[score] ?? `Score ${score}`;
}

/** One bucket per distinct satisfaction value, ascending by score */
export function satisfactionDistribution(records: readonly CanonicalRecord[]): SatisfactionBucket[] {
  const counts = new Map<number, number>();
  for (const r of records) {
    counts.set(r.satisfaction, (counts.get(r.satisfaction) ?? 0) + 1);
  }
  return [...counts]
    .sort(([a], [b]) => a - b)
    .map(([score, count]) => ({ score, label: satisfactionLabel(score), count }));
}

/** Participants summed per YYYY-MM month, ascending. Undated records are skipped. */
export function participantsTrend(records: readonly CanonicalRecord[]): TrendPoint[] {
  return aggregate(records, 'month')
    .map((g) => ({ month: g.key, participants: g.participantsSum }))
    .sort((a, b) => a.month.localeCompare(b.month));
}
