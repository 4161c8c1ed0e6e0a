// Dashboard Session: config, dataset cache and the operations behind each CLI command

import { confirmUpload, loadDataset, previewUpload } from './data-pipeline';
import { buildDashboard } from './data-processing/calculators';
import { exportFileName, toCsv } from './data-processing/csv-export';
import { defaultFilterCriteria, filterRecords, selectCentre, sortByDateDescending } from './data-processing/filters';
import DatasetCache from './dataset-cache';
import Logger from './logger';
import type { AppConfig, CanonicalRecord, Dashboard, FilterCriteria, LoadResult, NormalizeOptions, UploadPreview } from './types';

export interface CsvExport {
  fileName: string;
  csv: string;
  records: CanonicalRecord[];
}

class DashboardSession {
  readonly config: AppConfig;
  private cache: DatasetCache;

  constructor(config: AppConfig, cache: DatasetCache = new DatasetCache()) {
    this.config = config;
    this.cache = cache;
  }

  private get normalizeOptions(): NormalizeOptions {
    return { columnMappings: this.config.columnMappings, defaults: this.config.defaults };
  }

  /** Load (or reuse) the dataset for a file, defaulting to the configured data workbook */
  load(filePath: string = this.config.dataPath): Promise<LoadResult> {
    return this.cache.load(filePath, (p) => loadDataset(p, this.normalizeOptions));
  }

  async dashboard(centre: string, options: { audience?: string | null; filePath?: string } = {}): Promise<Dashboard> {
    const { records } = await this.load(options.filePath);
    return buildDashboard(records, centre, { audience: options.audience, topN: this.config.topN });
  }

  /**
   * Filter one centre's records and serialize them. Criteria not given take the
   * raw-data view defaults (first five programs, every category, no floor).
   */
  async exportCsv(centre: string, criteria: Partial<FilterCriteria> = {}, filePath?: string): Promise<CsvExport> {
    const { records } = await this.load(filePath);
    const scoped = selectCentre(records, centre);
    const filtered = filterRecords(scoped, { ...defaultFilterCriteria(scoped), ...criteria });
    Logger.debug(`Exporting ${filtered.length} of ${scoped.length} records for ${centre}`);
    return { fileName: exportFileName(centre), csv: toCsv(filtered), records: sortByDateDescending(filtered) };
  }

  preview(uploadPath: string): Promise<UploadPreview> {
    return previewUpload(uploadPath, this.config.previewRows);
  }

  /** Replace the data workbook with an upload and drop its cached dataset */
  async confirm(uploadPath: string): Promise<number> {
    const rows = await confirmUpload(uploadPath, this.config.dataPath);
    this.cache.invalidate(this.config.dataPath);
    return rows;
  }

  /** Manual "refresh data": forget every cached dataset */
  refresh(): void {
    this.cache.clear();
    Logger.info('Dataset cache cleared');
  }
}

export default DashboardSession;
