// Core Type Definitions for the Centre Programs Dashboard
// Single source of truth for all data structure types

// ============================================================================
// RAW DATA
// ============================================================================

export type RawCell = string | number | boolean | Date | null;

/** One spreadsheet row keyed by (trimmed) header name. Schema varies per upload. */
export type RawDataRow = Record<string, RawCell>;

// ============================================================================
// CANONICAL RECORDS
// ============================================================================

export interface CanonicalRecord {
  centre: string;
  program: string;
  /** Calendar date at UTC midnight, or null when absent/unparsable */
  date: Date | null;
  participants: number;
  satisfaction: number;
  category: string;
}

export type CanonicalField = keyof CanonicalRecord;

export interface ColumnMapping {
  candidate: string;
  field: CanonicalField;
}

/** Source column chosen for each canonical field, or null when none is present */
export type ResolvedColumns = Record<CanonicalField, string | null>;

export interface NormalizationDefaults {
  centre: string;
  program: string;
  category: string;
  participants: number;
  satisfaction: number;
}

export interface NormalizeOptions {
  columnMappings?: readonly ColumnMapping[];
  defaults?: Partial<NormalizationDefaults>;
}

// ============================================================================
// AGGREGATES
// ============================================================================

export type GroupKey = 'program' | 'category' | 'month';

export interface GroupAggregate {
  key: string;
  count: number;
  participantsSum: number;
  /** Absent (null) for a group with no records */
  satisfactionMean: number | null;
}

export interface DashboardMetrics {
  totalRecords: number;
  totalParticipants: number;
  averageSatisfaction: number | null;
  uniquePrograms: number;
  uniqueCategories: number;
}

export interface LabelCount {
  label: string;
  count: number;
}

export interface CategoryShare extends LabelCount {
  /** Fraction of records in this category (0–1) */
  share: number;
}

export interface SatisfactionBucket {
  score: number;
  label: string;
  count: number;
}

export interface TrendPoint {
  month: string;
  participants: number;
}

export interface FilterCriteria {
  programs: ReadonlySet<string>;
  categories: ReadonlySet<string>;
  minSatisfaction: number;
}

export interface Dashboard {
  centre: string;
  audience: string | null;
  metrics: DashboardMetrics;
  programFrequency: LabelCount[];
  categoryBreakdown: CategoryShare[];
  satisfactionDistribution: SatisfactionBucket[];
  participantsTrend: TrendPoint[];
  programPerformance: GroupAggregate[];
  audiencePerformance: GroupAggregate[];
}

// ============================================================================
// LOADING
// ============================================================================

export interface LoadResult {
  records: CanonicalRecord[];
  centres: string[];
  /** Set when the file could not be loaded; records is then empty */
  issue: string | null;
  sourcePath: string;
}

export interface UploadPreview {
  totalRows: number;
  headers: string[];
  rows: RawDataRow[];
  totalParticipants: number | null;
  averageSatisfaction: number | null;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface AppConfig {
  dataPath: string;
  columnMappings: ColumnMapping[];
  defaults: NormalizationDefaults;
  topN: number;
  previewRows: number;
}

export type AppConfigPatch = Partial<Omit<AppConfig, 'defaults'>> & {
  defaults?: Partial<NormalizationDefaults>;
};
