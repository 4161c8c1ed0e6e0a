// Data Pipeline: reads program spreadsheets from disk and builds the canonical dataset.
// Sheet 0 of .xlsx (exceljs), .xls or .csv (xlsx). Also previews uploads and re-saves a
// confirmed upload as the data workbook.

import * as fs from 'node:fs';
import * as path from 'node:path';
import ExcelJS from 'exceljs';
import { DEFAULT_COLUMN_MAPPINGS, DEFAULT_PREVIEW_ROWS, SOURCE_COLUMNS, SUPPORTED_EXTENSIONS } from './constants';
import { normalize } from './data-processing/importers';
import { parseNumber } from './data-processing/importers/parsers';
import { type ParsedTable, parseWorkbook } from './data-processing/importers/sheet-table';
import { listCentres } from './data-processing/filters';
import { mean } from './data-processing/utils';
import { LoadError } from './errors';
import Logger, { getErrorMessage } from './logger';
import type { LoadResult, NormalizeOptions, RawCell, RawDataRow, UploadPreview } from './types';
import { validateUploadHeaders } from './validators';

// ============================================================================
// EXCEL PARSING
// ============================================================================

/**
 * Text of a string or rich-text value. Hyperlink `text` is typed as a string,
 * but ExcelJS loads a rich-text hyperlink label as `{ richText }` there too.
 */
export function cellText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && 'richText' in value && Array.isArray(value.richText)) {
    return value.richText.map((rt: unknown) => (typeof rt === 'object' && rt !== null && 'text' in rt ? String(rt.text) : '')).join('');
  }
  return null;
}

/** Convert an ExcelJS cell value to a raw cell, keeping numbers and dates typed. */
function cellToValue(value: ExcelJS.CellValue | undefined): RawCell {
  if (value == null) return null;
  if (value instanceof Date) return value;
  if (typeof value !== 'object') return value;
  if ('error' in value) return null;
  if ('richText' in value) return cellText(value);
  if ('hyperlink' in value) return cellText(value.text);
  return cellToValue(value.result);
}

async function parseExcel(buffer: Buffer): Promise<ParsedTable> {
  const workbook = new ExcelJS.Workbook();
  // Cast needed: ExcelJS types expect old Buffer, TS 5.9+ infers Buffer<ArrayBufferLike>
  await workbook.xlsx.load(buffer as unknown as ArrayBuffer);
  const worksheet = workbook.worksheets[0];
  if (!worksheet) return { headers: [], rows: [] };

  const headers: string[] = [];
  const rows: RawDataRow[] = [];

  worksheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) {
      row.eachCell((cell, colNumber) => {
        headers[colNumber - 1] = String(cellToValue(cell.value) ?? '').trim();
      });
    } else {
      const obj: RawDataRow = {};
      row.eachCell((cell, colNumber) => {
        const header = headers[colNumber - 1];
        if (header) {
          obj[header] = cellToValue(cell.value);
        }
      });
      if (Object.keys(obj).length > 0) {
        rows.push(obj);
      }
    }
  });

  // Sparse header rows leave holes in the array
  return { headers: Array.from(headers, (h) => h ?? '').filter((h) => h !== ''), rows };
}

// ============================================================================
// FILE READING
// ============================================================================

type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

function isSupportedExtension(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * Read sheet 0 of a spreadsheet into headers and raw rows.
 * Throws LoadError when the file is missing, of an unsupported type, or unparsable.
 */
export async function readTable(filePath: string): Promise<ParsedTable> {
  if (!fs.existsSync(filePath)) {
    throw new LoadError(filePath, 'not-found', `File not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (!isSupportedExtension(ext)) {
    throw new LoadError(filePath, 'unsupported', `Unsupported file type "${ext}" (expected ${SUPPORTED_EXTENSIONS.join(', ')})`);
  }

  try {
    const buffer = fs.readFileSync(filePath);
    switch (ext) {
      case '.xlsx':
        return await parseExcel(buffer);
      case '.xls':
        return parseWorkbook(buffer);
      case '.csv':
        return parseWorkbook(buffer.toString('utf8').replace(/^\uFEFF/, ''));
    }
  } catch (err) {
    throw new LoadError(filePath, 'unreadable', `Error loading ${path.basename(filePath)}: ${getErrorMessage(err)}`, { cause: err });
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load and normalize a programs spreadsheet.
 * A LoadError is reported through `issue` with an empty dataset rather than thrown.
 */
export async function loadDataset(filePath: string, options: NormalizeOptions = {}): Promise<LoadResult> {
  const sourcePath = path.resolve(filePath);
  try {
    const table = await readTable(sourcePath);

    const validation = validateUploadHeaders(table.headers, options.columnMappings ?? DEFAULT_COLUMN_MAPPINGS);
    if (!validation.valid) {
      Logger.warn('Table shape issues:', validation.issues);
    }

    const records = normalize(table.rows, options);
    const centres = listCentres(records);
    Logger.info(`Loaded ${records.length} programs from ${centres.length} centres`);
    return { records, centres, issue: null, sourcePath };
  } catch (err) {
    if (!(err instanceof LoadError)) throw err;
    Logger.error('Could not load dataset:', err);
    return { records: [], centres: [], issue: err.message, sourcePath };
  }
}

/** Header summary of an upload before it is confirmed. Throws LoadError like readTable. */
export async function previewUpload(filePath: string, rowLimit: number = DEFAULT_PREVIEW_ROWS): Promise<UploadPreview> {
  const table = await readTable(filePath);

  const numericColumn = (column: string): number[] | null => {
    if (!table.headers.includes(column)) return null;
    const values: number[] = [];
    for (const row of table.rows) {
      const n = parseNumber(row[column]);
      if (n !== null) values.push(n);
    }
    return values;
  };

  const participants = numericColumn(SOURCE_COLUMNS.PARTICIPANTS);
  const satisfaction = numericColumn(SOURCE_COLUMNS.SATISFACTION);

  return {
    totalRows: table.rows.length,
    headers: table.headers,
    rows: table.rows.slice(0, Math.max(0, rowLimit)),
    totalParticipants: participants === null ? null : participants.reduce((sum, n) => sum + n, 0),
    averageSatisfaction: satisfaction === null ? null : mean(satisfaction)
  };
}

/**
 * Re-save an uploaded table as the data workbook (.xlsx), replacing any
 * previous one. Returns the number of rows written.
 */
export async function confirmUpload(sourcePath: string, dataPath: string): Promise<number> {
  const table = await readTable(sourcePath);

  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet('Programs');
  worksheet.columns = table.headers.map((header) => ({ header, key: header }));
  for (const row of table.rows) {
    worksheet.addRow(table.headers.map((header) => row[header] ?? null));
  }

  fs.mkdirSync(path.dirname(dataPath), { recursive: true });
  await workbook.xlsx.writeFile(dataPath);
  Logger.info(`Data saved to ${dataPath}`, { rows: table.rows.length });
  return table.rows.length;
}
