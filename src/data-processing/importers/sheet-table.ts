// Worksheet → header/rows table conversion for workbooks read with xlsx (.xls, .csv)

import * as XLSX from 'xlsx';
import type { RawCell, RawDataRow } from '../../types';

export interface ParsedTable {
  headers: string[];
  rows: RawDataRow[];
}

/**
 * Some exporters write a stale dimension (!ref) that covers only part of the
 * sheet. Recompute it from the cell addresses actually present.
 */
export function fixWorksheetRange(worksheet: XLSX.WorkSheet): void {
  const keys = Object.keys(worksheet).filter((k) => !k.startsWith('!'));
  if (keys.length === 0) return;

  let maxRow = 0;
  let maxCol = 0;

  for (const key of keys) {
    const match = key.match(/^([A-Z]+)(\d+)$/);
    if (!match) continue;
    const [, colLetters, rowStr] = match;
    const row = parseInt(rowStr, 10);
    const col = XLSX.utils.decode_col(colLetters);
    if (row > maxRow) maxRow = row;
    if (col > maxCol) maxCol = col;
  }

  if (maxRow > 0) {
    worksheet['!ref'] = XLSX.utils.encode_range({ s: { r: 0, c: 0 }, e: { r: maxRow - 1, c: maxCol } });
  }
}

function headerText(value: RawCell | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/** First row is the header; cells under blank headers are ignored */
export function worksheetToTable(worksheet: XLSX.WorkSheet | undefined): ParsedTable {
  if (!worksheet) return { headers: [], rows: [] };
  fixWorksheetRange(worksheet);

  const matrix = XLSX.utils.sheet_to_json<RawCell[]>(worksheet, { header: 1, raw: true, defval: null, blankrows: false });
  const [headerRow, ...body] = matrix;
  if (!headerRow) return { headers: [], rows: [] };

  const headers = headerRow.map(headerText);
  const rows = body.map((cells) => {
    const row: RawDataRow = {};
    headers.forEach((header, i) => {
      if (header) row[header] = cells[i] ?? null;
    });
    return row;
  });

  return { headers: headers.filter((h) => h !== ''), rows };
}

/** Parse a workbook buffer (or CSV text) with xlsx and table-ize its first sheet */
export function parseWorkbook(data: Buffer | string): ParsedTable {
  const workbook =
    typeof data === 'string'
      ? // Keep CSV values as text; the normalizer does the coercion
        XLSX.read(data, { type: 'string', raw: true })
      : XLSX.read(data, { type: 'buffer' });
  const firstSheetName = workbook.SheetNames[0];
  if (firstSheetName === undefined) return { headers: [], rows: [] };
  return worksheetToTable(workbook.Sheets[firstSheetName]);
}
