import { describe, expect, it } from 'vitest';
import {
  categoryBreakdown,
  participantsTrend,
  programFrequency,
  satisfactionDistribution,
  satisfactionLabel
} from '../calculators/distributions';
import { day, makeRecord } from './test-utils';

const records = [
  makeRecord({ program: 'Yoga', participants: 10, satisfaction: 5, date: day('2024-02-03') }),
  makeRecord({ program: 'Art', participants: 5, satisfaction: 4, date: day('2024-01-10'), category: 'Kids' }),
  makeRecord({ program: 'Yoga', participants: 20, satisfaction: 4, date: day('2024-02-17') }),
  makeRecord({ program: 'Chess', participants: 1, satisfaction: 2 }),
  makeRecord({ program: 'Art', participants: 8, satisfaction: 4 }),
  makeRecord({ program: 'Yoga', participants: 3, satisfaction: 4 })
];

describe('programFrequency', () => {
  it('counts entries per program, most frequent first', () => {
    expect(programFrequency(records)).toEqual([
      { label: 'Yoga', count: 3 },
      { label: 'Art', count: 2 },
      { label: 'Chess', count: 1 }
    ]);
  });

  it('applies the limit', () => {
    expect(programFrequency(records, 1)).toEqual([{ label: 'Yoga', count: 3 }]);
  });
});

describe('categoryBreakdown', () => {
  it('reports each category with its share of entries', () => {
    const breakdown = categoryBreakdown(records);
    expect(breakdown.map((e) => [e.label, e.count])).toEqual([
      ['Adults', 5],
      ['Kids', 1]
    ]);
    expect(breakdown[0].share).toBeCloseTo(5 / 6);
    expect(breakdown[1].share).toBeCloseTo(1 / 6);
  });

  it('is empty for no records', () => {
    expect(categoryBreakdown([])).toEqual([]);
  });
});

describe('satisfactionDistribution', () => {
  it('buckets scores in ascending order with labels', () => {
    expect(satisfactionDistribution(records)).toEqual([
      { score: 2, label: 'Poor', count: 1 },
      { score: 4, label: 'Good', count: 4 },
      { score: 5, label: 'Excellent', count: 1 }
    ]);
  });

  it('labels fractional scores by value', () => {
    expect(satisfactionLabel(3.5)).toBe('Score 3.5');
    expect(satisfactionLabel(1)).toBe('Very Poor');
  });
});

describe('participantsTrend', () => {
  it('sums participants per month in calendar order', () => {
    expect(participantsTrend(records)).toEqual([
      { month: '2024-01', participants: 5 },
      { month: '2024-02', participants: 30 }
    ]);
  });

  it('is empty when nothing is dated', () => {
    expect(participantsTrend([makeRecord()])).toEqual([]);
  });
});
