// Dataset Normalizer
// Coerces rows of an arbitrary spreadsheet into CanonicalRecords.
// Column problems never throw: missing columns and bad values take the configured fallbacks.

import { DEFAULT_COLUMN_MAPPINGS, DEFAULT_NORMALIZATION, SATISFACTION_MAX, SATISFACTION_MIN } from '../../constants';
import Logger from '../../logger';
import type {
  CanonicalRecord,
  ColumnMapping,
  NormalizationDefaults,
  NormalizeOptions,
  RawCell,
  RawDataRow,
  ResolvedColumns
} from '../../types';
import { isBlank, parseDate, parseNumber, parseText } from './parsers';

type FallbackCounts = Record<'centre' | 'program' | 'participants' | 'satisfaction' | 'category', number>;

/** All header names seen across the table, trimmed, in first-seen order */
export function collectHeaders(rows: readonly RawDataRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      const header = key.trim();
      if (header) seen.add(header);
    }
  }
  return [...seen];
}

/**
 * Pick the source column for each canonical field: the first candidate, in
 * mapping order, that appears among the headers.
 */
export function resolveColumns(headers: readonly string[], mappings: readonly ColumnMapping[] = DEFAULT_COLUMN_MAPPINGS): ResolvedColumns {
  const present = new Set(headers.map((h) => h.trim()));
  const resolved: ResolvedColumns = {
    centre: null,
    program: null,
    date: null,
    participants: null,
    satisfaction: null,
    category: null
  };
  for (const { candidate, field } of mappings) {
    if (resolved[field] === null && present.has(candidate)) {
      resolved[field] = candidate;
    }
  }
  return resolved;
}

function trimKeys(row: RawDataRow): RawDataRow {
  const result: RawDataRow = {};
  for (const [key, value] of Object.entries(row)) {
    result[key.trim()] = value;
  }
  return result;
}

function cell(row: RawDataRow, column: string | null): RawCell | undefined {
  return column === null ? undefined : row[column];
}

function isEmptyRow(row: RawDataRow): boolean {
  return Object.values(row).every((value) => isBlank(value));
}

function resolveParticipants(value: RawCell | undefined): number | null {
  const n = parseNumber(value);
  if (n === null || n < 0) return null;
  return Math.round(n);
}

function resolveSatisfaction(value: RawCell | undefined): number | null {
  const n = parseNumber(value);
  if (n === null || n < SATISFACTION_MIN || n > SATISFACTION_MAX) return null;
  return n;
}

/**
 * Normalize a raw table into CanonicalRecords.
 *
 * Rows whose every cell is blank are dropped. A blank cell in a resolved
 * column is treated the same as a missing column.
 */
export function normalize(rows: readonly RawDataRow[], options: NormalizeOptions = {}): CanonicalRecord[] {
  const mappings = options.columnMappings ?? DEFAULT_COLUMN_MAPPINGS;
  const defaults: NormalizationDefaults = { ...DEFAULT_NORMALIZATION, ...options.defaults };
  const columns = resolveColumns(collectHeaders(rows), mappings);

  const fallbacks: FallbackCounts = { centre: 0, program: 0, participants: 0, satisfaction: 0, category: 0 };
  const records: CanonicalRecord[] = [];
  let dropped = 0;

  for (const raw of rows) {
    const row = trimKeys(raw);
    if (isEmptyRow(row)) {
      dropped++;
      continue;
    }

    const centre = parseText(cell(row, columns.centre));
    const program = parseText(cell(row, columns.program));
    const participants = resolveParticipants(cell(row, columns.participants));
    const satisfaction = resolveSatisfaction(cell(row, columns.satisfaction));
    const category = parseText(cell(row, columns.category));

    if (centre === null) fallbacks.centre++;
    if (program === null) fallbacks.program++;
    if (participants === null) fallbacks.participants++;
    if (satisfaction === null) fallbacks.satisfaction++;
    if (category === null) fallbacks.category++;

    records.push({
      centre: centre ?? defaults.centre,
      program: program ?? defaults.program,
      date: columns.date === null ? null : parseDate(cell(row, columns.date)),
      participants: participants ?? defaults.participants,
      satisfaction: satisfaction ?? defaults.satisfaction,
      category: category ?? defaults.category
    });
  }

  Logger.debug('Normalized table', { columns, records: records.length, dropped, fallbacks });
  return records;
}
