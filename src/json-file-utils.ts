// JSON files in the data directory (config.json)

import * as fs from 'node:fs';
import * as path from 'node:path';
import Logger, { getErrorMessage } from './logger';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Parsed contents of a JSON file, or null when it is missing or not valid JSON */
export function loadJsonFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    if (!isMissingFile(err)) Logger.warn(`Could not read ${path.basename(filePath)}:`, getErrorMessage(err));
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    Logger.warn(`${path.basename(filePath)} is not valid JSON:`, getErrorMessage(err));
    return null;
  }
}

/**
 * Write JSON through a sibling temp file and a rename, creating parent
 * directories. Returns false (after logging) when the write fails.
 */
export function saveJsonFile(filePath: string, data: unknown): boolean {
  const tmp = `${filePath}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    fs.renameSync(tmp, filePath);
    return true;
  } catch (err) {
    Logger.warn(`Could not save ${path.basename(filePath)}:`, getErrorMessage(err));
    return false;
  }
}
