import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import ExcelJS from 'exceljs';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { cellText, confirmUpload, loadDataset, previewUpload, readTable } from '../data-pipeline';
import { toIsoDate } from '../data-processing/importers/parsers';
import { LoadError } from '../errors';
import Logger from '../logger';

let dir: string;

function fixture(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

async function xlsxFixture(name: string, rows: Array<Array<string | number | Date | null>>): Promise<string> {
  const file = path.join(dir, name);
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet('Programs');
  for (const row of rows) worksheet.addRow(row);
  await workbook.xlsx.writeFile(file);
  return file;
}

beforeAll(() => {
  Logger.disableConsole();
});

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'centre-dashboard-pipeline-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('readTable', () => {
  it('reads the first worksheet of an .xlsx file', async () => {
    const file = await xlsxFixture('programs.xlsx', [
      ['Location', 'Program', 'Participants'],
      ['Northside', 'Yoga', 12]
    ]);
    expect(await readTable(file)).toEqual({
      headers: ['Location', 'Program', 'Participants'],
      rows: [{ Location: 'Northside', Program: 'Yoga', Participants: 12 }]
    });
  });

  it('reads rich-text and hyperlink cells as text', async () => {
    const file = path.join(dir, 'links.xlsx');
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Programs');
    worksheet.addRow(['Location', 'Program']);
    worksheet.getCell('A2').value = { richText: [{ text: 'North' }, { text: 'side' }] };
    worksheet.getCell('B2').value = { text: 'Yoga', hyperlink: 'https://example.test/yoga' };
    await workbook.xlsx.writeFile(file);
    expect((await readTable(file)).rows).toEqual([{ Location: 'Northside', Program: 'Yoga' }]);
  });

  it('reads CSV text', async () => {
    const file = fixture('programs.csv', 'Location,Program\nNorthside,Yoga\n');
    expect(await readTable(file)).toEqual({ headers: ['Location', 'Program'], rows: [{ Location: 'Northside', Program: 'Yoga' }] });
  });

  it('raises LoadError for a missing file', async () => {
    await expect(readTable(path.join(dir, 'missing.xlsx'))).rejects.toBeInstanceOf(LoadError);
  });

  it('raises LoadError for an unsupported extension', async () => {
    const file = fixture('programs.txt', 'Program\nYoga\n');
    await expect(readTable(file)).rejects.toMatchObject({ name: 'LoadError', reason: 'unsupported' });
  });

  it('raises LoadError for a corrupt workbook', async () => {
    const file = fixture('corrupt.xlsx', 'this is not a zip archive');
    await expect(readTable(file)).rejects.toMatchObject({ name: 'LoadError', reason: 'unreadable', filePath: file });
  });
});

describe('cellText', () => {
  it('joins rich-text runs, including a hyperlink label held as rich text', () => {
    expect(cellText('Yoga')).toBe('Yoga');
    expect(cellText({ richText: [{ text: 'Clay ' }, { text: 'Studio', font: { bold: true } }] })).toBe('Clay Studio');
  });

  it('returns null for anything else', () => {
    expect(cellText(12)).toBeNull();
    expect(cellText({ formula: 'A1' })).toBeNull();
    expect(cellText(null)).toBeNull();
  });
});

describe('loadDataset', () => {
  it('normalizes a workbook into records and centres', async () => {
    const file = await xlsxFixture('programs.xlsx', [
      ['Location', 'Program', 'Date', 'Participants', 'Satisfaction'],
      ['Northside', 'Yoga', new Date(Date.UTC(2024, 2, 5)), 12, 5],
      ['Southgate', 'Chess', null, 8, 9]
    ]);

    const result = await loadDataset(file);

    expect(result.issue).toBeNull();
    expect(result.sourcePath).toBe(file);
    expect(result.centres).toEqual(['Northside', 'Southgate']);
    expect(result.records).toHaveLength(2);
    const [yoga, chess] = result.records;
    expect(yoga.date && toIsoDate(yoga.date)).toBe('2024-03-05');
    expect(yoga).toMatchObject({ centre: 'Northside', program: 'Yoga', participants: 12, satisfaction: 5, category: 'General' });
    expect(chess).toEqual({ centre: 'Southgate', program: 'Chess', date: null, participants: 8, satisfaction: 4, category: 'General' });
  });

  it('coerces CSV text values', async () => {
    const file = fixture('programs.csv', 'Center,Program,Participants\nEastgate,Swim,"1,200"\n');
    const { records } = await loadDataset(file);
    expect(records).toEqual([{ centre: 'Eastgate', program: 'Swim', date: null, participants: 1200, satisfaction: 4, category: 'General' }]);
  });

  it('applies configured mappings', async () => {
    const file = fixture('programs.csv', 'Site,Program\nEastgate,Swim\n');
    const { records } = await loadDataset(file, {
      columnMappings: [
        { candidate: 'Site', field: 'centre' },
        { candidate: 'Program', field: 'program' }
      ]
    });
    expect(records[0].centre).toBe('Eastgate');
  });

  it('reports a missing file as an issue with no data', async () => {
    const missing = path.join(dir, 'missing.xlsx');
    expect(await loadDataset(missing)).toEqual({
      records: [],
      centres: [],
      issue: `File not found: ${missing}`,
      sourcePath: missing
    });
  });

  it('reports an unsupported file as an issue', async () => {
    const file = fixture('programs.json', '[]');
    const result = await loadDataset(file);
    expect(result.records).toEqual([]);
    expect(result.issue).toBe('Unsupported file type ".json" (expected .xlsx, .xls, .csv)');
  });
});

describe('previewUpload', () => {
  const upload = 'Location,Program,Participants,Satisfaction\nA,Yoga,10,5\nA,Chess,abc,4\nB,Art,5,\n';

  it('summarizes rows, columns and numeric totals', async () => {
    const preview = await previewUpload(fixture('upload.csv', upload), 2);
    expect(preview.totalRows).toBe(3);
    expect(preview.headers).toEqual(['Location', 'Program', 'Participants', 'Satisfaction']);
    expect(preview.rows).toEqual([
      { Location: 'A', Program: 'Yoga', Participants: '10', Satisfaction: '5' },
      { Location: 'A', Program: 'Chess', Participants: 'abc', Satisfaction: '4' }
    ]);
    expect(preview.totalParticipants).toBe(15);
    expect(preview.averageSatisfaction).toBe(4.5);
  });

  it('leaves totals absent when their columns are missing', async () => {
    const preview = await previewUpload(fixture('upload.csv', 'Location,Program\nA,Yoga\n'));
    expect(preview.totalParticipants).toBeNull();
    expect(preview.averageSatisfaction).toBeNull();
  });
});

describe('confirmUpload', () => {
  it('re-saves the upload as the data workbook', async () => {
    const source = fixture('upload.csv', 'Location,Program,Participants,Satisfaction\nA,Yoga,10,5\nB,Art,5,\n');
    const dataPath = path.join(dir, 'store', 'programs-database.xlsx');

    expect(await confirmUpload(source, dataPath)).toBe(2);
    expect(fs.existsSync(dataPath)).toBe(true);

    const saved = await loadDataset(dataPath);
    const original = await loadDataset(source);
    expect(saved.records).toEqual(original.records);
  });

  it('leaves the data workbook alone when the upload cannot be read', async () => {
    const dataPath = path.join(dir, 'programs-database.xlsx');
    await expect(confirmUpload(path.join(dir, 'missing.csv'), dataPath)).rejects.toBeInstanceOf(LoadError);
    expect(fs.existsSync(dataPath)).toBe(false);
  });
});
