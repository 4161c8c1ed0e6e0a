import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';
import { fixWorksheetRange, parseWorkbook, worksheetToTable } from '../importers/sheet-table';

describe('fixWorksheetRange', () => {
  it('extends a stale range to the cells actually present', () => {
    const sheet = XLSX.utils.aoa_to_sheet([['Program']]);
    sheet.C3 = { t: 'n', v: 1 };
    fixWorksheetRange(sheet);
    expect(sheet['!ref']).toBe('A1:C3');
  });
});

describe('worksheetToTable', () => {
  it('keys rows by header and ignores columns without one', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      [' Program ', '', 'Participants'],
      ['Yoga', 'note', 3],
      ['Chess', null, null]
    ]);
    expect(worksheetToTable(sheet)).toEqual({
      headers: ['Program', 'Participants'],
      rows: [
        { Program: 'Yoga', Participants: 3 },
        { Program: 'Chess', Participants: null }
      ]
    });
  });

  it('returns an empty table for a missing sheet', () => {
    expect(worksheetToTable(undefined)).toEqual({ headers: [], rows: [] });
  });
});

describe('parseWorkbook', () => {
  it('reads the first sheet of a legacy workbook with typed numbers', () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['Program', 'Participants'],
        ['Yoga', 12]
      ]),
      'Programs'
    );
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xls' });
    expect(parseWorkbook(buffer)).toEqual({ headers: ['Program', 'Participants'], rows: [{ Program: 'Yoga', Participants: 12 }] });
  });

  it('reads CSV text without guessing types', () => {
    expect(parseWorkbook('Program,Date\nYoga,2024-03-05\n').rows).toEqual([{ Program: 'Yoga', Date: '2024-03-05' }]);
  });
});
