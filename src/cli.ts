import path from 'node:path';
import { getRpiTable, type RpiRow } from './core/analysis.js';
import { CLEAN_COLUMNS, cleanSessionsRecords, cleanSessionsTable } from './core/cleaning.js';
import { resolveConfig } from './core/config.js';
import { readCsvRecords, toCsv, writeCsvFile } from './core/csv.js';
import { formatUnknownError } from './core/errors.js';
import { createRunLogger, type RunLogger } from './core/logger.js';
import { parseSessionQuery } from './core/query.js';
import { getSessionsRecords } from './core/sessions.js';
import { formatTable } from './core/text-table.js';
import { loadTrackLookup, type TrackLookup } from './core/track-lookup.js';

export const USAGE = `Usage:
  indystats                                   open the interactive picker
  indystats fetch [--from YEAR] [--to YEAR] [--type R|P|Q|W|All]
                  [--format table|csv] [--out DIR]
  indystats clean <file.csv> [--type R|P|Q|W|All] [--out DIR]
  indystats rpi <file.csv> [--by-season] [--min-races N]
  indystats --help`;

const BOOLEAN_FLAGS = new Set(['--by-season', '--help', '-h']);

const FETCH_TABLE_COLUMNS = [
  'season',
  'event_name',
  'session_type',
  'car_number',
  'driver_name',
  'position_start',
  'position_finish',
  'status',
  'best_lap_time',
] as const;

const RPI_COLUMNS = [
  'driver_name',
  'races_completed',
  'average_starting_position',
  'average_finish_position',
  'finish_percentile_index',
  'finish_rate',
  'adj_finish_rate',
  'points_earned',
  'points_per_race',
  'race_performance_index',
] as const satisfies ReadonlyArray<keyof RpiRow>;

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: RunLogger;
  lookup?: TrackLookup;
};

const defaultIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type ParsedArgs = {
  positionals: string[];
  getArg: (flag: string) => string | null;
  hasFlag: (flag: string) => boolean;
};

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    if (!token.startsWith('-')) {
      positionals.push(token);
      continue;
    }
    if (BOOLEAN_FLAGS.has(token)) {
      flags.add(token);
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new UsageError(`${token} needs a value`);
    }
    values.set(token, next);
    i++;
  }

  return {
    positionals,
    getArg: (flag) => values.get(flag) ?? null,
    hasFlag: (flag) => flags.has(flag),
  };
}

function yearArg(value: string | null): number | undefined {
  return value === null ? undefined : Number(value);
}

function fileArg(args: ParsedArgs, command: string): string {
  const [file] = args.positionals;
  if (file === undefined) throw new UsageError(`${command} needs a CSV file`);
  return file;
}

async function runFetch(args: ParsedArgs, io: CliIo): Promise<number> {
  const cwd = io.cwd ?? process.cwd();
  const config = await resolveConfig({ env: io.env, cwd });
  const logger = io.logger ?? createRunLogger({ dataDir: config.dataDir }).logger;
  const out = args.getArg('--out');

  const result = await getSessionsRecords(
    {
      fromYear: yearArg(args.getArg('--from')),
      toYear: yearArg(args.getArg('--to')),
      sessionType: args.getArg('--type') ?? undefined,
      dataFormat: args.getArg('--format') ?? undefined,
    },
    {
      logger,
      lookup: io.lookup,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      requestDelayMs: config.requestDelayMs,
      outputDir: out === null ? config.outputDir : path.resolve(cwd, out),
    },
  );

  if (result.format === 'table') {
    io.stdout(formatTable(result.records, FETCH_TABLE_COLUMNS));
    io.stderr(`${result.records.length} rows, ${result.skipped.length} sessions skipped`);
  } else {
    io.stdout(`Wrote ${result.rowCount} rows to ${result.path}`);
    if (result.skipped.length > 0) io.stderr(`${result.skipped.length} sessions skipped`);
  }
  return 0;
}

async function runClean(args: ParsedArgs, io: CliIo): Promise<number> {
  const file = fileArg(args, 'clean');
  const cwd = io.cwd ?? process.cwd();
  const { sessionType } = parseSessionQuery({ sessionType: args.getArg('--type') ?? 'All' });
  const out = args.getArg('--out');
  const outputDir =
    out === null ? (await resolveConfig({ env: io.env, cwd })).outputDir : path.resolve(cwd, out);

  const rows = await readCsvRecords(path.resolve(cwd, file));
  const lookup = io.lookup ?? (await loadTrackLookup());
  const { records, stats } = cleanSessionsTable(rows, lookup, { sessionType });
  const target = await writeCsvFile(
    path.join(outputDir, path.basename(file)),
    toCsv(records, CLEAN_COLUMNS),
  );

  const dropped = stats.missingSessionId + stats.duplicates + stats.filtered;
  io.stdout(`Wrote ${records.length} rows to ${target} (${dropped} dropped)`);
  return 0;
}

async function runRpi(args: ParsedArgs, io: CliIo): Promise<number> {
  const file = fileArg(args, 'rpi');
  const cwd = io.cwd ?? process.cwd();
  const minRacesArg = args.getArg('--min-races');
  const minRaces = minRacesArg === null ? 0 : Number(minRacesArg);
  if (!Number.isInteger(minRaces) || minRaces < 0) {
    throw new UsageError('--min-races must be a whole number');
  }
  const bySeason = args.hasFlag('--by-season');

  const rows = await readCsvRecords(path.resolve(cwd, file));
  const lookup = io.lookup ?? (await loadTrackLookup());
  const table = getRpiTable(cleanSessionsRecords(rows, lookup), { bySeason, minRaces });

  io.stdout(
    bySeason
      ? formatTable(table, ['season', ...RPI_COLUMNS])
      : formatTable(table, RPI_COLUMNS),
  );
  return 0;
}

/** Run one headless command and resolve with the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  try {
    const [command, ...rest] = argv;
    const args = parseArgs(rest);
    if (command === undefined || command === '--help' || command === '-h' || args.hasFlag('--help')) {
      io.stdout(USAGE);
      return 0;
    }
    switch (command) {
      case 'fetch':
        return await runFetch(args, io);
      case 'clean':
        return await runClean(args, io);
      case 'rpi':
        return await runRpi(args, io);
      default:
        throw new UsageError(`unknown command '${command}'`);
    }
  } catch (err) {
    io.stderr(`indystats: ${formatUnknownError(err)}`);
    if (err instanceof UsageError) io.stderr(USAGE);
    return 1;
  }
}
