import { describe, expect, it } from 'vitest';
import { aggregate } from '../calculators/aggregation';
import { collectHeaders, normalize, resolveColumns } from '../importers/normalizer';
import { toIsoDate } from '../importers/parsers';

describe('resolveColumns', () => {
  it('picks the first candidate present for each field', () => {
    const columns = resolveColumns(['Center', 'Location', 'Course Name', 'Category', 'Target Audience']);
    expect(columns).toEqual({
      centre: 'Location',
      program: 'Course Name',
      date: null,
      participants: null,
      satisfaction: null,
      category: 'Target Audience'
    });
  });

  it('uses custom mappings when given', () => {
    const columns = resolveColumns(['Site'], [{ candidate: 'Site', field: 'centre' }]);
    expect(columns.centre).toBe('Site');
    expect(columns.program).toBeNull();
  });
});

describe('collectHeaders', () => {
  it('unions trimmed keys in first-seen order', () => {
    expect(collectHeaders([{ ' Location ': 'A' }, { Program: 'Yoga', Location: 'B' }])).toEqual(['Location', 'Program']);
  });
});

describe('normalize', () => {
  it('fills missing values from the defaults (end-to-end example)', () => {
    const records = normalize([
      { Location: 'A', Program: 'Quran Classes', Participants: 10, Satisfaction: 5 },
      { Location: 'A', Program: 'Quran Classes' }
    ]);

    expect(records).toHaveLength(2);
    expect(records.every((r) => r.centre === 'A' && r.program === 'Quran Classes')).toBe(true);
    expect(records[1].participants).toBe(1);
    expect(records[1].satisfaction).toBe(4);
    expect(aggregate(records, 'program')).toEqual([{ key: 'Quran Classes', count: 2, participantsSum: 11, satisfactionMean: 4.5 }]);
  });

  it('gives every record one participant when the column is missing', () => {
    const records = normalize([
      { Location: 'A', Program: 'Yoga' },
      { Location: 'B', Program: 'Chess' }
    ]);
    expect(records.map((r) => r.participants)).toEqual([1, 1]);
  });

  it('rounds participant counts and defaults negative or non-numeric ones', () => {
    const records = normalize([
      { Program: 'Yoga', Participants: '12.6' },
      { Program: 'Yoga', Participants: -3 },
      { Program: 'Yoga', Participants: '1,200' },
      { Program: 'Yoga', Participants: 'many' },
      { Program: 'Yoga', Participants: 0 }
    ]);
    expect(records.map((r) => r.participants)).toEqual([13, 1, 1200, 1, 0]);
  });

  it('defaults satisfaction outside 1 to 5 or non-numeric to 4', () => {
    const records = normalize([
      { Program: 'Yoga', Satisfaction: 0 },
      { Program: 'Yoga', Satisfaction: 6 },
      { Program: 'Yoga', Satisfaction: 'great' },
      { Program: 'Yoga', Satisfaction: '3.5' },
      { Program: 'Yoga', Satisfaction: 1 }
    ]);
    expect(records.map((r) => r.satisfaction)).toEqual([4, 4, 4, 3.5, 1]);
  });

  it('prefers "Location Name" over "Location"', () => {
    const [record] = normalize([{ 'Location Name': 'X', Location: 'Y', Program: 'Yoga' }]);
    expect(record.centre).toBe('X');
  });

  it('resolves columns per table, so a blank preferred cell takes the default', () => {
    const records = normalize([
      { 'Location Name': 'X', Location: 'Y' },
      { 'Location Name': '', Location: 'Y' }
    ]);
    expect(records.map((r) => r.centre)).toEqual(['X', 'Unassigned']);
  });

  it('uses "General" when no category column exists', () => {
    const [record] = normalize([{ Location: 'A', Program: 'Yoga' }]);
    expect(record.category).toBe('General');
  });

  it('prefers "Target Audience" over "Category"', () => {
    const [record] = normalize([{ Program: 'Yoga', 'Target Audience': 'Seniors', Category: 'Wellness' }]);
    expect(record.category).toBe('Seniors');
  });

  it('falls back to "Program Name", "Course Name", then "Program"', () => {
    expect(normalize([{ 'Course Name': 'Pottery', Program: 'Arts' }])[0].program).toBe('Pottery');
    expect(normalize([{ 'Program Name': 'Chess', 'Course Name': 'Pottery' }])[0].program).toBe('Chess');
    expect(normalize([{ Location: 'A' }])[0].program).toBe('Program');
  });

  it('drops rows whose every cell is blank', () => {
    const records = normalize([
      { Location: 'A', Program: 'Yoga' },
      { Location: '  ', Program: null }
    ]);
    expect(records).toHaveLength(1);
  });

  it('trims header whitespace', () => {
    const [record] = normalize([{ ' Location ': 'A', 'Program ': 'Yoga' }]);
    expect(record.centre).toBe('A');
    expect(record.program).toBe('Yoga');
  });

  it('parses dates and leaves them null when absent or unparsable', () => {
    const records = normalize([
      { Program: 'Yoga', Date: '2024-03-05' },
      { Program: 'Yoga', Date: 'soon' },
      { Program: 'Yoga', Date: null }
    ]);
    expect(records[0].date && toIsoDate(records[0].date)).toBe('2024-03-05');
    expect(records[1].date).toBeNull();
    expect(records[2].date).toBeNull();
    expect(normalize([{ Program: 'Yoga' }])[0].date).toBeNull();
  });

  it('applies custom mappings and defaults', () => {
    const [record] = normalize([{ Site: 'Eastgate', Activity: 'Swim' }], {
      columnMappings: [
        { candidate: 'Site', field: 'centre' },
        { candidate: 'Activity', field: 'program' }
      ],
      defaults: { category: 'Everyone', satisfaction: 3 }
    });
    expect(record).toEqual({
      centre: 'Eastgate',
      program: 'Swim',
      date: null,
      participants: 1,
      satisfaction: 3,
      category: 'Everyone'
    });
  });

  it('returns an empty list for an empty table', () => {
    expect(normalize([])).toEqual([]);
  });
});
