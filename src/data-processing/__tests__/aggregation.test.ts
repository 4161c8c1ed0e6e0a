import { describe, expect, it } from 'vitest';
import { aggregate, groupKeyOf, rankGroups } from '../calculators/aggregation';
import { day, makeRecord } from './test-utils';

const records = [
  makeRecord({ program: 'Yoga', participants: 10, satisfaction: 4, date: day('2024-01-15') }),
  makeRecord({ program: 'Yoga', participants: 25, satisfaction: 5, date: day('2024-01-20') }),
  makeRecord({ program: 'Chess', participants: 30, satisfaction: 3, date: day('2024-02-01'), category: 'Youth' }),
  makeRecord({ program: 'Art', participants: 30, satisfaction: 2, category: 'Youth' })
];

describe('aggregate', () => {
  it('groups by program, ranked by participants with ties by name', () => {
    expect(aggregate(records, 'program')).toEqual([
      { key: 'Yoga', count: 2, participantsSum: 35, satisfactionMean: 4.5 },
      { key: 'Art', count: 1, participantsSum: 30, satisfactionMean: 2 },
      { key: 'Chess', count: 1, participantsSum: 30, satisfactionMean: 3 }
    ]);
  });

  it('groups by category', () => {
    expect(aggregate(records, 'category')).toEqual([
      { key: 'Youth', count: 2, participantsSum: 60, satisfactionMean: 2.5 },
      { key: 'Adults', count: 2, participantsSum: 35, satisfactionMean: 4.5 }
    ]);
  });

  it('groups by month and skips undated records', () => {
    expect(aggregate(records, 'month')).toEqual([
      { key: '2024-01', count: 2, participantsSum: 35, satisfactionMean: 4.5 },
      { key: '2024-02', count: 1, participantsSum: 30, satisfactionMean: 3 }
    ]);
  });

  it('returns an empty list for no records', () => {
    expect(aggregate([], 'program')).toEqual([]);
  });

  it('keeps group sums equal to the total', () => {
    const total = records.reduce((sum, r) => sum + r.participants, 0);
    const grouped = aggregate(records, 'program').reduce((sum, g) => sum + g.participantsSum, 0);
    expect(grouped).toBe(total);
  });
});

describe('groupKeyOf', () => {
  it('returns null for the month of an undated record', () => {
    expect(groupKeyOf(makeRecord(), 'month')).toBeNull();
    expect(groupKeyOf(makeRecord({ date: day('2024-06-30') }), 'month')).toBe('2024-06');
  });
});

describe('rankGroups', () => {
  it('keeps the first N groups', () => {
    const ranked = rankGroups(aggregate(records, 'program'), 2);
    expect(ranked.map((g) => g.key)).toEqual(['Yoga', 'Art']);
  });

  it('returns nothing for a non-positive limit', () => {
    expect(rankGroups(aggregate(records, 'program'), 0)).toEqual([]);
    expect(rankGroups(aggregate(records, 'program'), -1)).toEqual([]);
  });
});
