// Public API of the centre programs dashboard

export { runCli, buildConfigPatch, type CliIO } from './commands';
export { default as ConfigManager, resolveDataDir } from './config-manager';
export * from './constants';
export { default as DashboardSession, type CsvExport } from './dashboard-session';
export { confirmUpload, loadDataset, previewUpload, readTable } from './data-pipeline';
export * from './data-processing/calculators';
export * from './data-processing/csv-export';
export * from './data-processing/filters';
export * from './data-processing/importers';
export { default as DatasetCache, sourceIdentity } from './dataset-cache';
export { LoadError, type LoadErrorReason, UsageError } from './errors';
export { default as Logger, getErrorMessage } from './logger';
export { buildStats, DashboardReport, type ReportOptions, renderDashboardReport, reportFileName } from './renderer/dashboard-report';
export type * from './types';
export { validateConfigPatch, validateUploadHeaders, type ValidationResult } from './validators';
