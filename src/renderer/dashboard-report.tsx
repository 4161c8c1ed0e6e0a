// Dashboard Report: renders one centre's dashboard to a standalone HTML page

import { render } from 'preact-render-to-string';
import { DEFAULT_TOP_N } from '../constants';
import { fileSlug } from '../data-processing/utils';
import type { CanonicalRecord, Dashboard } from '../types';
import { type Stat, STAT_COLORS, StatCards } from './components/stat-cards';
import { formatCount, formatSatisfaction, formatSatisfactionPercent, formatTimestamp } from './format-utils';
import { AudienceBreakdown } from './reports/audience-breakdown';
import { GroupPerformance } from './reports/group-performance';
import { ParticipantsTrend } from './reports/participants-trend';
import { ProgramDistribution } from './reports/program-distribution';
import { RawData } from './reports/raw-data';
import { SatisfactionDistribution } from './reports/satisfaction-distribution';

export interface ReportOptions {
  generatedAt?: Date;
  topN?: number;
  /** Filtered records to list in a raw-data section */
  rawRecords?: CanonicalRecord[];
}

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 2rem; color: #222; }
h1 { color: #1f3a93; }
h3 { color: #2d5aa3; margin-top: 1.5rem; }
.stat-cards { display: grid; gap: 1rem; margin: 1rem 0; }
.stat-card { border: 1px solid #ddd; border-radius: 0.5rem; padding: 1rem; }
.stat-card-label { font-size: 0.85rem; color: #555; }
.stat-card-value { font-size: 1.6rem; font-weight: bold; }
.stat-card-desc { font-size: 0.75rem; color: #888; }
table { border-collapse: collapse; width: 100%; }
th, td { border-bottom: 1px solid #eee; padding: 0.35rem 0.5rem; text-align: left; }
th.num, td.num { text-align: right; }
.bar-cell { position: relative; min-width: 12rem; }
.bar { height: 1rem; display: inline-block; vertical-align: middle; border-radius: 2px; }
.bar-label { margin-left: 0.5rem; }
.empty-row { color: #888; font-style: italic; }
.report-grid { display: grid; grid-template-columns: 1fr 1fr; gap: 2rem; }
footer { margin-top: 2rem; color: #666; font-size: 0.8rem; }
`;

export function buildStats(dashboard: Dashboard): Stat[] {
  const { metrics } = dashboard;
  return [
    { label: 'Total Programs', value: formatCount(metrics.totalRecords), description: 'entries', color: STAT_COLORS.BLUE },
    { label: 'Total Participants', value: formatCount(metrics.totalParticipants), description: 'people', color: STAT_COLORS.PURPLE },
    {
      label: 'Avg Satisfaction',
      value: formatSatisfactionPercent(metrics.averageSatisfaction),
      description: formatSatisfaction(metrics.averageSatisfaction),
      color: STAT_COLORS.GREEN
    },
    { label: 'Unique Programs', value: formatCount(metrics.uniquePrograms), description: 'types', color: STAT_COLORS.TEAL },
    { label: 'Audiences', value: formatCount(metrics.uniqueCategories), description: 'groups', color: STAT_COLORS.ORANGE }
  ];
}

export function DashboardReport({ dashboard, options = {} }: { dashboard: Dashboard; options?: ReportOptions }) {
  const topN = options.topN ?? DEFAULT_TOP_N;
  const title = dashboard.audience ? `${dashboard.centre} — ${dashboard.audience}` : dashboard.centre;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{`${title} | Centre Dashboard`}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <h1>{title}</h1>
        <StatCards stats={buildStats(dashboard)} />
        <div class="report-grid">
          <ProgramDistribution entries={dashboard.programFrequency} limit={topN} />
          <AudienceBreakdown entries={dashboard.categoryBreakdown} />
        </div>
        <ParticipantsTrend points={dashboard.participantsTrend} />
        <GroupPerformance title={`Top ${topN} Programs: Participants & Satisfaction`} keyLabel="Program" groups={dashboard.programPerformance} />
        <GroupPerformance title="Target Audience Performance" keyLabel="Target Audience" groups={dashboard.audiencePerformance} />
        <SatisfactionDistribution buckets={dashboard.satisfactionDistribution} />
        {options.rawRecords && <RawData records={options.rawRecords} />}
        {options.generatedAt && <footer>Generated {formatTimestamp(options.generatedAt)}</footer>}
      </body>
    </html>
  );
}

/** Render the dashboard as a complete HTML document */
export function renderDashboardReport(dashboard: Dashboard, options: ReportOptions = {}): string {
  return `<!DOCTYPE html>${render(<DashboardReport dashboard={dashboard} options={options} />)}`;
}

/** Default file name for a centre's report, e.g. `Richmond_Hill_dashboard.html` */
export function reportFileName(centre: string): string {
  return `${fileSlug(centre)}_dashboard.html`;
}
