// Formatting and display utilities

import { NO_VALUE, SATISFACTION_MAX } from '../constants';
import { toIsoDate } from '../data-processing/importers/parsers';

/** Thousands-separated integer (e.g. 1,234) */
export function formatCount(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

/** Mean satisfaction as "4.50/5.0", or "—" when absent */
export function formatSatisfaction(value: number | null): string {
  if (value === null) return NO_VALUE;
  return `${value.toFixed(2)}/${SATISFACTION_MAX.toFixed(1)}`;
}

/** Mean satisfaction as a percentage of the top score (4.5 → "90.0%") */
export function formatSatisfactionPercent(value: number | null): string {
  if (value === null) return NO_VALUE;
  return `${((value / SATISFACTION_MAX) * 100).toFixed(1)}%`;
}

/** Two-decimal mean for tables, or "—" */
export function formatMean(value: number | null): string {
  return value === null ? NO_VALUE : value.toFixed(2);
}

/** Fraction as a one-decimal percentage (0.25 → "25.0%") */
export function formatShare(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function formatDate(date: Date | null): string {
  return date ? toIsoDate(date) : '-';
}

/** Bar width relative to the largest value in a series, as a CSS percentage */
export function barWidth(value: number, max: number): string {
  if (max <= 0 || value <= 0) return '0%';
  return `${Math.min(100, (value / max) * 100).toFixed(1)}%`;
}

/** Full timestamp for the report footer (e.g. "Feb 5, 2026, 3:45 PM") */
export function formatTimestamp(date: Date): string {
  return date.toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    hour12: true
  });
}
