// Group Aggregation
// Count, participant sum, and satisfaction mean per program, category, or month

import type { CanonicalRecord, GroupAggregate, GroupKey } from '../../types';
import { toMonthKey } from '../importers/parsers';

interface Accumulator {
  count: number;
  participantsSum: number;
  satisfactionSum: number;
}

/** Grouping key for a record, or null when the record has no value for it (undated records for 'month') */
export function groupKeyOf(record: CanonicalRecord, key: GroupKey): string | null {
  switch (key) {
    case 'program':
      return record.program;
    case 'category':
      return record.category;
    case 'month':
      return record.date ? toMonthKey(record.date) : null;
  }
}

/**
 * Aggregate records by program, category, or YYYY-MM month bucket.
 *
 * Sorted by participant sum descending (ranking views), ties by key ascending.
 * Empty input yields an empty list.
 */
export function aggregate(records: readonly CanonicalRecord[], key: GroupKey): GroupAggregate[] {
  const groups = new Map<string, Accumulator>();

  for (const record of records) {
    const groupKey = groupKeyOf(record, key);
    if (groupKey === null) continue;
    let acc = groups.get(groupKey);
    if (!acc) {
      acc = { count: 0, participantsSum: 0, satisfactionSum: 0 };
      groups.set(groupKey, acc);
    }
    acc.count++;
    acc.participantsSum += record.participants;
    acc.satisfactionSum += record.satisfaction;
  }

  const result: GroupAggregate[] = [];
  for (const [groupKey, acc] of groups) {
    result.push({
      key: groupKey,
      count: acc.count,
      participantsSum: acc.participantsSum,
      satisfactionMean: acc.count > 0 ? acc.satisfactionSum / acc.count : null
    });
  }

  return result.sort((a, b) => b.participantsSum - a.participantsSum || a.key.localeCompare(b.key));
}

/** Top N groups of an already-ranked aggregate list */
export function rankGroups(groups: readonly GroupAggregate[], limit: number): GroupAggregate[] {
  return groups.slice(0, Math.max(0, limit));
}
