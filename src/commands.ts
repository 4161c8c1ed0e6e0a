// CLI commands: argument parsing and one handler per command

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import ConfigManager, { isRecord, resolveDataDir } from './config-manager';
import DashboardSession from './dashboard-session';
import { listAudiences, selectAudience, selectCentre } from './data-processing/filters';
import { UsageError } from './errors';
import Logger, { getErrorMessage } from './logger';
import { renderDashboardReport, reportFileName } from './renderer/dashboard-report';
import { formatCount, formatMean, formatSatisfaction } from './renderer/format-utils';
import type { FilterCriteria, LoadResult } from './types';
import { parseConfigPatch, validateConfigPatch } from './validators';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const processIO: CliIO = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  }
};

export const USAGE = `Usage: centre-dashboard <command> [options]

Commands:
  centres [file]          List centres with their entry counts
  summary [file]          Print a centre's headline metrics and top programs
  report [file]           Write a centre's dashboard as an HTML page
  export [file]           Write a centre's filtered records as CSV
  preview <upload>        Summarize an upload without saving it
  confirm <upload>        Replace the data workbook with an upload
  config                  Print the configuration

[file] defaults to the configured data workbook.

Options:
  --data-dir <dir>        Data directory (default: $CENTRE_DASHBOARD_DATA_DIR or ./data)
  -c, --centre <name>     Centre to show (default: first centre)
  -a, --audience <name>   Restrict summary and report to one target audience
  --program <name>        Program to include in exported rows (repeatable)
  --category <name>       Category to include in exported rows (repeatable)
  --min-satisfaction <n>  Lowest satisfaction score in exported rows
  -o, --out <path>        Output file for report and export
  --set <key=value>       Change a config value, e.g. topN=5 or defaults.centre=Main (repeatable)
  -q, --quiet             Write logs to the log file only
  -v, --verbose           Show debug logs
  -h, --help              Show this help`;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'data-dir': { type: 'string' },
      centre: { type: 'string', short: 'c' },
      audience: { type: 'string', short: 'a' },
      program: { type: 'string', multiple: true },
      category: { type: 'string', multiple: true },
      'min-satisfaction': { type: 'string' },
      out: { type: 'string', short: 'o' },
      set: { type: 'string', multiple: true },
      quiet: { type: 'boolean', short: 'q' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}

type CliOptions = ReturnType<typeof parseCliArgs>['values'];

interface CommandContext {
  session: DashboardSession;
  configManager: ConfigManager;
  options: CliOptions;
  /** Positionals after the command name */
  args: string[];
  io: CliIO;
}

type Command = (ctx: CommandContext) => Promise<number>;

// ============================================================================
// HELPERS
// ============================================================================

interface Scope {
  result: LoadResult;
  centre: string;
  audience: string | null;
}

/** Load the dataset; prints the reason and returns null when there is nothing to show */
async function requireData(ctx: CommandContext): Promise<LoadResult | null> {
  const result = await ctx.session.load(ctx.args[0]);
  if (result.issue !== null) {
    ctx.io.err(result.issue);
    return null;
  }
  if (result.records.length === 0) {
    ctx.io.err('No data available. Load a spreadsheet with "confirm <upload>".');
    return null;
  }
  return result;
}

async function resolveScope(ctx: CommandContext): Promise<Scope | null> {
  const result = await requireData(ctx);
  if (!result) return null;

  const centre = ctx.options.centre ?? result.centres[0];
  if (!result.centres.includes(centre)) {
    throw new UsageError(`Unknown centre "${centre}" (available: ${result.centres.join(', ')})`);
  }

  const audience = ctx.options.audience ?? null;
  if (audience !== null) {
    const audiences = listAudiences(selectCentre(result.records, centre));
    if (!audiences.includes(audience)) {
      throw new UsageError(`Unknown audience "${audience}" for ${centre} (available: ${audiences.join(', ')})`);
    }
  }
  return { result, centre, audience };
}

function criteriaFromOptions(options: CliOptions): Partial<FilterCriteria> {
  const rawMin = options['min-satisfaction'];
  let minSatisfaction: number | undefined;
  if (rawMin !== undefined) {
    minSatisfaction = Number(rawMin);
    if (rawMin.trim() === '' || !Number.isFinite(minSatisfaction)) {
      throw new UsageError(`--min-satisfaction expects a number, got "${rawMin}"`);
    }
  }
  return {
    ...(options.program && { programs: new Set(options.program) }),
    ...(options.category && { categories: new Set(options.category) }),
    ...(minSatisfaction !== undefined && { minSatisfaction })
  };
}

function requireUploadArg(ctx: CommandContext, command: string): string {
  const file = ctx.args[0];
  if (!file) throw new UsageError(`${command} needs the path of an upload`);
  return file;
}

function writeOutput(outPath: string, content: string): void {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, content, 'utf8');
  Logger.info(`Wrote ${outPath}`);
}

function parseSettingValue(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Not JSON: take it as a plain string (e.g. dataPath=uploads/programs.xlsx)
    return text;
  }
}

/** Turn `key=value` settings into a nested patch object; dotted keys nest */
export function buildConfigPatch(settings: readonly string[]): Record<string, unknown> {
  const patch: Record<string, unknown> = {};
  for (const setting of settings) {
    const eq = setting.indexOf('=');
    if (eq <= 0) throw new UsageError(`Expected key=value, got "${setting}"`);
    const keys = setting.slice(0, eq).trim().split('.');
    const value = parseSettingValue(setting.slice(eq + 1));

    let target = patch;
    for (const key of keys.slice(0, -1)) {
      const next = target[key];
      if (isRecord(next)) {
        target = next;
      } else {
        const created: Record<string, unknown> = {};
        target[key] = created;
        target = created;
      }
    }
    target[keys[keys.length - 1]] = value;
  }
  return patch;
}

// ============================================================================
// COMMANDS
// ============================================================================

const centresCommand: Command = async (ctx) => {
  const result = await requireData(ctx);
  if (!result) return 1;
  for (const centre of result.centres) {
    ctx.io.out(`${centre}\t${formatCount(selectCentre(result.records, centre).length)}`);
  }
  return 0;
};

const summaryCommand: Command = async (ctx) => {
  const scope = await resolveScope(ctx);
  if (!scope) return 1;
  const { io } = ctx;
  const dashboard = await ctx.session.dashboard(scope.centre, { audience: scope.audience, filePath: ctx.args[0] });
  const { metrics, programPerformance } = dashboard;

  io.out(`Centre: ${dashboard.centre}`);
  if (dashboard.audience) io.out(`Audience: ${dashboard.audience}`);
  io.out(`Total Programs: ${formatCount(metrics.totalRecords)}`);
  io.out(`Total Participants: ${formatCount(metrics.totalParticipants)}`);
  io.out(`Avg Satisfaction: ${formatSatisfaction(metrics.averageSatisfaction)}`);
  io.out(`Unique Programs: ${formatCount(metrics.uniquePrograms)}`);
  io.out(`Audiences: ${formatCount(metrics.uniqueCategories)}`);

  if (programPerformance.length > 0) {
    io.out('Top programs by participants:');
    programPerformance.forEach((group, i) => {
      io.out(`  ${i + 1}. ${group.key}: ${formatCount(group.participantsSum)} participants, ${formatMean(group.satisfactionMean)} avg satisfaction`);
    });
  }
  return 0;
};

const reportCommand: Command = async (ctx) => {
  const scope = await resolveScope(ctx);
  if (!scope) return 1;
  const { session, options } = ctx;
  const dashboard = await session.dashboard(scope.centre, { audience: scope.audience, filePath: ctx.args[0] });
  const { records } = await session.exportCsv(scope.centre, criteriaFromOptions(options), ctx.args[0]);
  const rawRecords = scope.audience ? selectAudience(records, scope.audience) : records;

  const html = renderDashboardReport(dashboard, { generatedAt: new Date(), topN: session.config.topN, rawRecords });
  const outPath = path.resolve(options.out ?? reportFileName(scope.centre));
  writeOutput(outPath, html);
  ctx.io.out(`Report written to ${outPath}`);
  return 0;
};

const exportCommand: Command = async (ctx) => {
  const scope = await resolveScope(ctx);
  if (!scope) return 1;
  const exported = await ctx.session.exportCsv(scope.centre, criteriaFromOptions(ctx.options), ctx.args[0]);
  const outPath = path.resolve(ctx.options.out ?? exported.fileName);
  writeOutput(outPath, exported.csv);
  ctx.io.out(`Exported ${formatCount(exported.records.length)} records to ${outPath}`);
  return 0;
};

const previewCommand: Command = async (ctx) => {
  const file = requireUploadArg(ctx, 'preview');
  const preview = await ctx.session.preview(file);
  const { io } = ctx;

  io.out(`File: ${path.basename(file)}`);
  io.out(`Rows: ${formatCount(preview.totalRows)}`);
  io.out(`Columns: ${preview.headers.join(', ')}`);
  if (preview.totalParticipants !== null) io.out(`Total Participants: ${formatCount(preview.totalParticipants)}`);
  if (preview.averageSatisfaction !== null) io.out(`Avg Satisfaction: ${formatSatisfaction(preview.averageSatisfaction)}`);
  io.out(`First ${preview.rows.length} rows:`);
  for (const row of preview.rows) {
    io.out(`  ${JSON.stringify(row)}`);
  }
  return 0;
};

const confirmCommand: Command = async (ctx) => {
  const file = requireUploadArg(ctx, 'confirm');
  const { session, io } = ctx;
  const rows = await session.confirm(file);
  io.out(`Saved ${formatCount(rows)} rows to ${session.config.dataPath}`);

  const result = await session.load();
  if (result.issue !== null) {
    io.err(result.issue);
    return 1;
  }
  io.out(`Loaded ${formatCount(result.records.length)} programs from ${formatCount(result.centres.length)} centres`);
  return 0;
};

const configCommand: Command = async (ctx) => {
  const settings = ctx.options.set ?? [];
  if (settings.length === 0) {
    ctx.io.out(JSON.stringify(ctx.session.config, null, 2));
    return 0;
  }

  const patch = buildConfigPatch(settings);
  const validation = validateConfigPatch(patch);
  if (!validation.valid) {
    for (const issue of validation.issues) ctx.io.err(`Invalid config: ${issue}`);
    return 1;
  }
  const updated = ctx.configManager.updateConfig(parseConfigPatch(patch));
  ctx.io.out(JSON.stringify(updated, null, 2));
  return 0;
};

const COMMANDS = new Map<string, Command>([
  ['centres', centresCommand],
  ['summary', summaryCommand],
  ['report', reportCommand],
  ['export', exportCommand],
  ['preview', previewCommand],
  ['confirm', confirmCommand],
  ['config', configCommand]
]);

// ============================================================================
// ENTRY
// ============================================================================

/** Run one CLI invocation and resolve to its exit code */
export async function runCli(argv: string[], io: CliIO = processIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.err(getErrorMessage(err));
    io.err(USAGE);
    return 1;
  }

  const { values: options, positionals } = parsed;
  if (options.help) {
    io.out(USAGE);
    return 0;
  }

  const [name, ...args] = positionals;
  if (name === undefined) {
    io.err(USAGE);
    return 1;
  }
  const command = COMMANDS.get(name);
  if (!command) {
    io.err(`Unknown command "${name}"`);
    io.err(USAGE);
    return 1;
  }

  const dataDir = resolveDataDir(options['data-dir']);
  if (options.quiet) Logger.disableConsole();
  else Logger.enableConsole();
  Logger.setVerbose(options.verbose ?? false);
  Logger.init(dataDir);

  try {
    const configManager = new ConfigManager(dataDir);
    const session = new DashboardSession(configManager.loadConfig());
    return await command({ session, configManager, options, args, io });
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(err.message);
      return 1;
    }
    Logger.error(`${name} failed:`, err);
    io.err(getErrorMessage(err));
    return 1;
  } finally {
    Logger.close();
  }
}
