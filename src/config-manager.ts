import * as path from 'node:path';
import type { z } from 'zod';
import { DATA_DIR_ENV, DATA_FILES, DEFAULT_COLUMN_MAPPINGS, DEFAULT_NORMALIZATION, DEFAULT_PREVIEW_ROWS, DEFAULT_TOP_N } from './constants';
import { loadJsonFile, saveJsonFile } from './json-file-utils';
import Logger from './logger';
import type { AppConfig, AppConfigPatch } from './types';
import { appConfigFieldSchemas, normalizationDefaultsSchema, validateConfigPatch } from './validators';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Data directory from an explicit argument, the environment, or ./data */
export function resolveDataDir(explicit?: string): string {
  return path.resolve(explicit || process.env[DATA_DIR_ENV] || 'data');
}

/** Read one config key; a present but invalid value falls back and marks the file for healing */
function readField<T>(disk: Record<string, unknown>, key: string, schema: z.ZodType<T>, fallback: T): { value: T; healed: boolean } {
  if (!(key in disk)) return { value: fallback, healed: false };
  const parsed = schema.safeParse(disk[key]);
  if (parsed.success) return { value: parsed.data, healed: false };
  Logger.warn(`Config key "${key}" is invalid, using default`);
  return { value: fallback, healed: true };
}

class ConfigManager {
  private dataDir: string;
  private configPath: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.configPath = path.join(dataDir, DATA_FILES.CONFIG);
  }

  getDefaults(): AppConfig {
    return {
      dataPath: path.join(this.dataDir, DATA_FILES.DATABASE),
      columnMappings: DEFAULT_COLUMN_MAPPINGS.map((m) => ({ ...m })),
      defaults: { ...DEFAULT_NORMALIZATION },
      topN: DEFAULT_TOP_N,
      previewRows: DEFAULT_PREVIEW_ROWS
    };
  }

  loadConfig(): AppConfig {
    const defaults = this.getDefaults();
    const disk = loadJsonFile(this.configPath);
    if (disk === null) {
      this.saveConfig(defaults);
      return defaults;
    }
    if (!isRecord(disk)) {
      Logger.warn('Config file is not an object, resetting to defaults');
      this.saveConfig(defaults);
      return defaults;
    }

    const fields = {
      dataPath: readField(disk, 'dataPath', appConfigFieldSchemas.dataPath, defaults.dataPath),
      columnMappings: readField(disk, 'columnMappings', appConfigFieldSchemas.columnMappings, defaults.columnMappings),
      defaults: readField(disk, 'defaults', normalizationDefaultsSchema.partial(), {}),
      topN: readField(disk, 'topN', appConfigFieldSchemas.topN, defaults.topN),
      previewRows: readField(disk, 'previewRows', appConfigFieldSchemas.previewRows, defaults.previewRows)
    };

    const result: AppConfig = {
      // Relative data paths are relative to the data directory
      dataPath: path.resolve(this.dataDir, fields.dataPath.value),
      columnMappings: fields.columnMappings.value,
      defaults: { ...defaults.defaults, ...fields.defaults.value },
      topN: fields.topN.value,
      previewRows: fields.previewRows.value
    };

    let healed = Object.values(fields).some((f) => f.healed);

    // Detect unknown top-level keys
    for (const key of Object.keys(disk)) {
      if (!(key in defaults)) healed = true;
    }

    if (healed) this.saveConfig(result);
    return result;
  }

  saveConfig(config: AppConfig): boolean {
    return saveJsonFile(this.configPath, config);
  }

  /** Apply a validated patch. Throws when the patch does not match the config schema or cannot be saved. */
  updateConfig(patch: AppConfigPatch): AppConfig {
    const validation = validateConfigPatch(patch);
    if (!validation.valid) {
      throw new Error(`Invalid config: ${validation.issues.join('; ')}`);
    }
    const current = this.loadConfig();
    const { defaults: defaultsPatch, ...rest } = patch;
    const updated: AppConfig = { ...current, ...rest, defaults: { ...current.defaults, ...defaultsPatch } };
    if (!this.saveConfig(updated)) {
      throw new Error(`Could not save ${DATA_FILES.CONFIG}`);
    }
    return updated;
  }
}

export default ConfigManager;
