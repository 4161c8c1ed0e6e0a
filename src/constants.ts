// Application-wide Constants
// Single source of truth for column names, fallback values, and string literals

import type { ColumnMapping, NormalizationDefaults } from './types';

// ============================================================================
// SOURCE COLUMNS
// ============================================================================

export const SOURCE_COLUMNS = {
  LOCATION_NAME: 'Location Name',
  LOCATION: 'Location',
  CENTER: 'Center',
  CENTRE: 'Centre',
  PROGRAM_NAME: 'Program Name',
  COURSE_NAME: 'Course Name',
  PROGRAM: 'Program',
  DATE: 'Date',
  PARTICIPANTS: 'Participants',
  SATISFACTION: 'Satisfaction',
  TARGET_AUDIENCE: 'Target Audience',
  CATEGORY: 'Category'
} as const;

/**
 * Candidate column names in priority order. The first candidate present in a
 * table wins for its field, so "Location Name" beats "Location" beats "Center".
 * "Centre" matches the column written by CSV export.
 */
export const DEFAULT_COLUMN_MAPPINGS: readonly ColumnMapping[] = [
  { candidate: SOURCE_COLUMNS.LOCATION_NAME, field: 'centre' },
  { candidate: SOURCE_COLUMNS.LOCATION, field: 'centre' },
  { candidate: SOURCE_COLUMNS.CENTER, field: 'centre' },
  { candidate: SOURCE_COLUMNS.CENTRE, field: 'centre' },
  { candidate: SOURCE_COLUMNS.PROGRAM_NAME, field: 'program' },
  { candidate: SOURCE_COLUMNS.COURSE_NAME, field: 'program' },
  { candidate: SOURCE_COLUMNS.PROGRAM, field: 'program' },
  { candidate: SOURCE_COLUMNS.DATE, field: 'date' },
  { candidate: SOURCE_COLUMNS.PARTICIPANTS, field: 'participants' },
  { candidate: SOURCE_COLUMNS.SATISFACTION, field: 'satisfaction' },
  { candidate: SOURCE_COLUMNS.TARGET_AUDIENCE, field: 'category' },
  { candidate: SOURCE_COLUMNS.CATEGORY, field: 'category' }
];

// ============================================================================
// NORMALIZATION DEFAULTS
// ============================================================================

export const DEFAULT_NORMALIZATION: NormalizationDefaults = {
  centre: 'Unassigned',
  program: 'Program',
  category: 'General',
  participants: 1,
  satisfaction: 4
};

export const SATISFACTION_MIN = 1;
export const SATISFACTION_MAX = 5;

export const SATISFACTION_LABELS: Readonly<Record<number, string>> = {
  1: 'Very Poor',
  2: 'Poor',
  3: 'Neutral',
  4: 'Good',
  5: 'Excellent'
};

// ============================================================================
// DASHBOARD
// ============================================================================

/** Ranked views (program frequency, program performance) show this many rows */
export const DEFAULT_TOP_N = 10;

/** Raw-data view pre-selects this many programs */
export const DEFAULT_SELECTED_PROGRAMS = 5;

export const DEFAULT_PREVIEW_ROWS = 10;

// ============================================================================
// FILES
// ============================================================================

export const EXCEL_EPOCH = new Date(Date.UTC(1899, 11, 30));
export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const SUPPORTED_EXTENSIONS = ['.xlsx', '.xls', '.csv'] as const;

export const DATA_FILES = {
  CONFIG: 'config.json',
  LOG: 'app.log',
  DATABASE: 'programs-database.xlsx'
} as const;

export const DATA_DIR_ENV = 'CENTRE_DASHBOARD_DATA_DIR';

export const CSV_EXPORT_HEADERS = ['Date', 'Program', 'Participants', 'Satisfaction', 'Category', 'Centre'] as const;

export const NO_VALUE = '—';
