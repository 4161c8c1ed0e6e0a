// Filter Evaluator and centre/audience selection

import { DEFAULT_SELECTED_PROGRAMS, SATISFACTION_MIN } from '../constants';
import type { CanonicalRecord, FilterCriteria } from '../types';
import { uniqueInOrder, uniqueSorted } from './utils';

/**
 * Records whose program and category are both included and whose
 * satisfaction meets the threshold. An empty inclusion set matches nothing.
 */
export function filterRecords(records: readonly CanonicalRecord[], criteria: FilterCriteria): CanonicalRecord[] {
  const { programs, categories, minSatisfaction } = criteria;
  if (programs.size === 0 || categories.size === 0) return [];
  return records.filter((r) => programs.has(r.program) && categories.has(r.category) && r.satisfaction >= minSatisfaction);
}

/**
 * Initial raw-data view selection: the first few programs in appearance
 * order, every category, and no satisfaction floor.
 */
export function defaultFilterCriteria(records: readonly CanonicalRecord[]): FilterCriteria {
  return {
    programs: new Set(uniqueInOrder(records.map((r) => r.program)).slice(0, DEFAULT_SELECTED_PROGRAMS)),
    categories: new Set(records.map((r) => r.category)),
    minSatisfaction: SATISFACTION_MIN
  };
}

/** Newest first; undated records keep their relative order at the end */
export function sortByDateDescending(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  return [...records].sort((a, b) => {
    if (a.date && b.date) return b.date.getTime() - a.date.getTime();
    if (a.date) return -1;
    if (b.date) return 1;
    return 0;
  });
}

export function listCentres(records: readonly CanonicalRecord[]): string[] {
  return uniqueSorted(records.map((r) => r.centre));
}

export function selectCentre(records: readonly CanonicalRecord[], centre: string): CanonicalRecord[] {
  return records.filter((r) => r.centre === centre);
}

export function listAudiences(records: readonly CanonicalRecord[]): string[] {
  return uniqueSorted(records.map((r) => r.category));
}

export function selectAudience(records: readonly CanonicalRecord[], category: string): CanonicalRecord[] {
  return records.filter((r) => r.category === category);
}
