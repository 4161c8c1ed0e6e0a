// Pure parsing functions for spreadsheet cells

import { EXCEL_EPOCH, MS_PER_DAY } from '../../constants';
import type { RawCell } from '../../types';

/** True for null, undefined, NaN, and whitespace-only strings */
export function isBlank(value: RawCell | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (typeof value === 'number') return Number.isNaN(value);
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return false;
}

/** Cell as trimmed text, or null when blank */
export function parseText(value: RawCell | undefined): string | null {
  if (value === null || value === undefined || isBlank(value)) return null;
  if (value instanceof Date) return toIsoDate(value);
  return String(value).trim();
}

/**
 * Parse a numeric cell. Accepts numbers and numeric strings with thousands
 * separators; returns null for anything else (including partial matches like "12abc").
 */
export function parseNumber(value: RawCell | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const cleaned = value.trim().replace(/,/g, '');
  if (cleaned === '') return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

/** Parse Excel date serial number to a UTC-midnight Date */
export function parseExcelDate(excelDate: number): Date | null {
  if (!Number.isFinite(excelDate) || excelDate <= 0) return null;
  return new Date(EXCEL_EPOCH.getTime() + Math.floor(excelDate) * MS_PER_DAY);
}

const EXPLICIT_ZONE = /(?:Z|\b(?:GMT|UTC)|[+-]\d{2}:?\d{2})(?:\s*\([^)]*\))?$/;

function utcDate(year: number, month: number, day: number): Date | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  // Reject rollovers such as 2024-02-31
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d;
}

/**
 * Parse a date cell into a calendar date held at UTC midnight.
 * Accepts Date objects, Excel serials, YYYY-MM-DD, YYYY-MM (first of the month)
 * and M/D/YYYY strings, and anything else Date.parse understands. Returns null
 * when unparsable.
 */
export function parseDate(value: RawCell | undefined): Date | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return utcDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
  }
  if (typeof value === 'number') return parseExcelDate(value);
  if (typeof value !== 'string') return null;

  const str = value.trim();
  if (str === '') return null;

  const iso = str.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:$|[T\s])/);
  if (iso) return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const yearMonth = str.match(/^(\d{4})[-/](\d{1,2})$/);
  if (yearMonth) return utcDate(Number(yearMonth[1]), Number(yearMonth[2]), 1);

  const us = str.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:$|\s)/);
  if (us) return utcDate(Number(us[3]), Number(us[1]), Number(us[2]));

  // Plain numbers in a text cell are not dates
  if (/^\d+(\.\d+)?$/.test(str)) return null;

  const ms = Date.parse(str);
  if (Number.isNaN(ms)) return null;
  const d = new Date(ms);
  // A string with its own zone names a UTC instant; anything else is local time
  if (EXPLICIT_ZONE.test(str)) return utcDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
  return utcDate(d.getFullYear(), d.getMonth() + 1, d.getDate());
}

/** Format a Date as YYYY-MM-DD using its UTC calendar date */
export function toIsoDate(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/** YYYY-MM bucket of a date */
export function toMonthKey(date: Date): string {
  return toIsoDate(date).slice(0, 7);
}
