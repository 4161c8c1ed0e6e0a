// Data Processing Utility Functions
// Shared helper functions used across data-processing modules

import type { LabelCount } from '../types';

/** Arithmetic mean, or null for an empty list (never NaN) */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Distinct values in first-appearance order */
export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

/** Distinct strings sorted with locale-aware comparison */
export function uniqueSorted(values: Iterable<string>): string[] {
  return uniqueInOrder(values).sort((a, b) => a.localeCompare(b));
}

/** Count occurrences of each key, in first-appearance order */
export function countBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/** Sort label counts by count descending, then label ascending */
export function sortByCountDesc<T extends LabelCount>(entries: T[]): T[] {
  return entries.sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));
}

/** File-name-safe form of a label: runs of other characters become "_", blank becomes "all" */
export function fileSlug(label: string): string {
  return label.trim().replace(/[^\w.-]+/g, '_') || 'all';
}
