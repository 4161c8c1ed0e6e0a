// CSV export of canonical records, and parsing of delimited text back into raw rows

import * as XLSX from 'xlsx';
import { CSV_EXPORT_HEADERS } from '../constants';
import type { CanonicalRecord, RawDataRow } from '../types';
import { toIsoDate } from './importers/parsers';
import { parseWorkbook } from './importers/sheet-table';
import { fileSlug } from './utils';

type CsvCell = string | number;

function toRow(record: CanonicalRecord): CsvCell[] {
  return [record.date ? toIsoDate(record.date) : '', record.program, record.participants, record.satisfaction, record.category, record.centre];
}

/** Serialize records with a `Date,Program,Participants,Satisfaction,Category,Centre` header */
export function toCsv(records: readonly CanonicalRecord[]): string {
  const sheet = XLSX.utils.aoa_to_sheet([[...CSV_EXPORT_HEADERS], ...records.map(toRow)]);
  return XLSX.utils.sheet_to_csv(sheet);
}

/**
 * Parse CSV text into raw rows keyed by header. Values stay as text
 * (no number or date guessing), which the normalizer then coerces.
 */
export function parseCsv(text: string): RawDataRow[] {
  return parseWorkbook(text.replace(/^\uFEFF/, '')).rows;
}

/** Download name for a centre's filtered data, e.g. `Richmond_Hill_programs_data.csv` */
export function exportFileName(centre: string): string {
  return `${fileSlug(centre)}_programs_data.csv`;
}
