// Headline Metrics
// Totals shown in the stat cards at the top of a centre dashboard

import type { CanonicalRecord, DashboardMetrics } from '../../types';
import { mean } from '../utils';

export function calculateMetrics(records: readonly CanonicalRecord[]): DashboardMetrics {
  return {
    totalRecords: records.length,
    totalParticipants: records.reduce((sum, r) => sum + r.participants, 0),
    averageSatisfaction: mean(records.map((r) => r.satisfaction)),
    uniquePrograms: new Set(records.map((r) => r.program)).size,
    uniqueCategories: new Set(records.map((r) => r.category)).size
  };
}
