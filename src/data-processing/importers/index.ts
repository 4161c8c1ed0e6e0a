// Importers: re-exports for the public API

export { collectHeaders, normalize, resolveColumns } from './normalizer';
export { isBlank, parseDate, parseExcelDate, parseNumber, parseText, toIsoDate, toMonthKey } from './parsers';
export type { ParsedTable } from './sheet-table';
export { fixWorksheetRange, parseWorkbook, worksheetToTable } from './sheet-table';
