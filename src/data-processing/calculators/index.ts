// Dashboard Calculators - Main Orchestrator
// Coordinates the calculation modules to build one centre's dashboard

import { DEFAULT_TOP_N } from '../../constants';
import type { CanonicalRecord, Dashboard } from '../../types';
import { selectAudience, selectCentre } from '../filters';
import { aggregate, rankGroups } from './aggregation';
import { categoryBreakdown, participantsTrend, programFrequency, satisfactionDistribution } from './distributions';
import { calculateMetrics } from './metrics';

export interface DashboardOptions {
  /**
   * Restrict the overview (metrics, distributions, trend, top programs) to one
   * target audience. Audience performance and the satisfaction distribution
   * always cover the whole centre.
   */
  audience?: string | null;
  topN?: number;
}

/** Build the complete dashboard for one centre */
function buildDashboard(records: readonly CanonicalRecord[], centre: string, options: DashboardOptions = {}): Dashboard {
  const topN = options.topN ?? DEFAULT_TOP_N;
  const audience = options.audience ?? null;

  const centreRecords = selectCentre(records, centre);
  const scoped = audience === null ? centreRecords : selectAudience(centreRecords, audience);

  return {
    centre,
    audience,
    metrics: calculateMetrics(scoped),
    programFrequency: programFrequency(scoped, topN),
    categoryBreakdown: categoryBreakdown(scoped),
    satisfactionDistribution: satisfactionDistribution(centreRecords),
    participantsTrend: participantsTrend(scoped),
    programPerformance: rankGroups(aggregate(scoped, 'program'), topN),
    audiencePerformance: aggregate(centreRecords, 'category')
  };
}

export { buildDashboard };
export { aggregate, groupKeyOf, rankGroups } from './aggregation';
export { categoryBreakdown, participantsTrend, programFrequency, satisfactionDistribution, satisfactionLabel } from './distributions';
export { calculateMetrics } from './metrics';
