/**
 * Logger: writes to the console and to a log file in the data directory.
 *
 * The log file is truncated each time Logger.init() is called,
 * so it always contains only the current session's logs.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DATA_FILES } from './constants';

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

let logStream: fs.WriteStream | null = null;
let consoleEnabled = true;
let debugEnabled = false;

/** Extract a readable message from an unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

function formatData(data: unknown): string {
  if (data === null || data === undefined) return '';
  if (data instanceof Error) return ` ${data.message}`;
  if (typeof data === 'string') return ` ${data}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

function timestamp(): string {
  const d = new Date();
  const hh = String(d.getHours()).padStart(2, '0');
  const mm = String(d.getMinutes()).padStart(2, '0');
  const ss = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${hh}:${mm}:${ss}.${ms}`;
}

function writeLine(level: Level, message: string, data: unknown): void {
  const line = `${timestamp()} [${level}] ${message}${formatData(data)}\n`;

  // Debug lines always reach the file; the console only shows them on request
  if (consoleEnabled && (level !== 'DEBUG' || debugEnabled)) {
    if (level === 'ERROR') console.error(line.trimEnd());
    else if (level === 'WARN') console.warn(line.trimEnd());
    else console.log(line.trimEnd());
  }

  if (logStream) {
    logStream.write(line);
  }
}

const Logger = {
  /**
   * Initialize file logging. Call once at startup.
   * Truncates the log file so only the current session is kept.
   */
  init(dataDir: string): void {
    const logFilePath = path.join(dataDir, DATA_FILES.LOG);
    if (logStream) {
      logStream.end();
      logStream = null;
    }
    try {
      fs.mkdirSync(dataDir, { recursive: true });
      logStream = fs.createWriteStream(logFilePath, { flags: 'w' });
      logStream.on('error', (err) => {
        console.error('Log stream error:', err);
        logStream = null;
      });
    } catch (err) {
      console.error('Failed to create log file:', err);
    }
    writeLine('INFO', `=== Session started (${new Date().toISOString()}) ===`, null);
  },

  /** Disable console output (CLI --quiet, tests) */
  disableConsole(): void {
    consoleEnabled = false;
  },

  enableConsole(): void {
    consoleEnabled = true;
  },

  /** Echo debug lines to the console as well as the log file */
  setVerbose(verbose: boolean): void {
    debugEnabled = verbose;
  },

  debug(message: string, data: unknown = null): void {
    writeLine('DEBUG', message, data);
  },

  info(message: string, data: unknown = null): void {
    writeLine('INFO', message, data);
  },

  warn(message: string, data: unknown = null): void {
    writeLine('WARN', message, data);
  },

  error(message: string, error: unknown = null): void {
    writeLine('ERROR', message, error);
  },

  /** Flush and close the log stream (call before the process exits) */
  close(): void {
    if (logStream) {
      logStream.end(`${timestamp()} [INFO] === Session ended ===\n`);
      logStream = null;
    }
  }
};

export default Logger;
