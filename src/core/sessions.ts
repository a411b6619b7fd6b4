import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { CLEAN_COLUMNS, cleanSessionsTable, type CleanSessionTable } from './cleaning.js';
import { parseEventDate } from './coerce.js';
import { sessionsCsvFilename, toCsv, writeCsvFile } from './csv.js';
import { RunAbortedError } from './errors.js';
import { getSeasonIndex, getSessionDetails, type ApiOptions } from './indystats-api.js';
import { noopLogger, type RunLogger } from './logger.js';
import {
  parseSessionQuery,
  type SessionQuery,
  type SessionQueryInput,
  type SessionTypeFilter,
} from './query.js';
import { loadTrackLookup, type TrackLookup } from './track-lookup.js';
import type { RawSessionRecord, SessionDetails, SessionRef, SkippedSession } from './types.js';

export const DEFAULT_REQUEST_DELAY_MS = 200;

const SESSION_NAME_MATCHERS: Record<Exclude<SessionTypeFilter, 'All'>, string> = {
  R: 'Race',
  P: 'Practice',
  Q: 'Qualif',
  W: 'Warm',
};

export type FetchProgress = {
  completed: number;
  total: number;
  skipped: number;
  current: SessionRef | null;
};

export type FetchDeps = ApiOptions & {
  logger?: RunLogger;
  requestDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: FetchProgress) => void;
};

export type FetchSessionsResult = {
  query: SessionQuery;
  sessions: SessionRef[];
  records: RawSessionRecord[];
  skipped: SkippedSession[];
};

export type GetSessionsOptions = FetchDeps & {
  lookup?: TrackLookup;
  outputDir?: string;
};

export type SessionsRecordsResult =
  | { format: 'table'; records: CleanSessionTable; skipped: SkippedSession[] }
  | { format: 'csv'; path: string; rowCount: number; skipped: SkippedSession[] };

/** Every session of every season in [fromYear, toYear], in index order. */
export async function listSessions(
  fromYear: number,
  toYear: number,
  opts: ApiOptions = {},
): Promise<SessionRef[]> {
  const index = await getSeasonIndex(opts);
  const refs: SessionRef[] = [];
  for (const season of index) {
    const year = Number(season.Year);
    if (!Number.isInteger(year) || year < fromYear || year > toYear) continue;
    for (const event of season.Events) {
      for (const session of event.Sessions) {
        refs.push({
          year,
          eventId: String(event.EventID),
          eventName: event.EventName,
          sessionId: String(session.EventsSessionID),
          sessionName: session.SessionName,
        });
      }
    }
  }
  return refs;
}

export function filterSessionsByType(
  refs: readonly SessionRef[],
  sessionType: SessionTypeFilter,
): SessionRef[] {
  if (sessionType === 'All') return [...refs];
  const needle = SESSION_NAME_MATCHERS[sessionType];
  return refs.filter((ref) => ref.sessionName.includes(needle));
}

function toRawRecords(ref: SessionRef, details: SessionDetails): RawSessionRecord[] {
  const season = parseEventDate(details.SessionDate)?.getUTCFullYear() ?? ref.year;
  return details.records.map((record) => ({
    ...record,
    EventName: details.EventName ?? ref.eventName,
    EventDate: details.SessionDate,
    EventType: details.SessionName,
    SessionType: details.SessionType,
    TrackType: details.TrackType,
    EventID: ref.eventId,
    EventsSessionsID: record.EventsSessionsID ?? ref.sessionId,
    Season: season,
  }));
}

/**
 * Fetch the raw rows of every matching session, one request at a time.
 * A session that fails to download or parse is skipped and logged.
 */
export async function fetchSessionsRecords(
  input: SessionQueryInput,
  deps: FetchDeps = {},
): Promise<FetchSessionsResult> {
  const query = parseSessionQuery(input);
  const logger = deps.logger ?? noopLogger;
  const requestDelayMs = deps.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const api: ApiOptions = { baseUrl: deps.baseUrl, timeoutMs: deps.timeoutMs, signal: deps.signal };

  await logger({ type: 'fetch-start', ...query });
  const all = await listSessions(query.fromYear, query.toYear, api);
  const sessions = filterSessionsByType(all, query.sessionType);
  await logger({ type: 'season-index', sessions: all.length, selected: sessions.length });

  const records: RawSessionRecord[] = [];
  const skipped: SkippedSession[] = [];
  deps.onProgress?.({ completed: 0, total: sessions.length, skipped: 0, current: null });

  for (const [i, ref] of sessions.entries()) {
    if (deps.signal?.aborted) throw new RunAbortedError();
    if (i > 0 && requestDelayMs > 0) await sleep(requestDelayMs);

    const result = await getSessionDetails(ref.sessionId, api);
    if (result.ok) {
      const rows = toRawRecords(ref, result.value);
      const inRange = rows.filter(
        (row) => row.Season >= query.fromYear && row.Season <= query.toYear,
      );
      records.push(...inRange);
      await logger({
        type: 'session-fetched',
        sessionId: ref.sessionId,
        rows: inRange.length,
        outOfRange: rows.length - inRange.length,
      });
    } else {
      const entry: SkippedSession = {
        sessionId: ref.sessionId,
        eventName: ref.eventName,
        sessionName: ref.sessionName,
        reason: result.error,
        ...(result.statusCode === undefined ? {} : { statusCode: result.statusCode }),
      };
      skipped.push(entry);
      await logger({ type: 'session-skipped', ...entry });
    }
    deps.onProgress?.({
      completed: i + 1,
      total: sessions.length,
      skipped: skipped.length,
      current: ref,
    });
  }

  await logger({
    type: 'fetch-finish',
    sessions: sessions.length,
    rows: records.length,
    skipped: skipped.length,
  });
  return { query, sessions, records, skipped };
}

/**
 * Fetch, clean and return the sessions of a query, or write them to
 * `sessions_<from>[_<to>].csv` under `outputDir` when `dataFormat` is csv.
 */
export async function getSessionsRecords(
  input: SessionQueryInput,
  options: GetSessionsOptions = {},
): Promise<SessionsRecordsResult> {
  const query = parseSessionQuery(input);
  const logger = options.logger ?? noopLogger;
  const lookup = options.lookup ?? (await loadTrackLookup());
  const fetched = await fetchSessionsRecords(query, options);

  // Sessions were already selected by name.
  const { records, stats } = cleanSessionsTable(fetched.records, lookup);
  if (stats.missingSessionId + stats.duplicates > 0) {
    await logger({ type: 'rows-dropped', ...stats });
  }

  if (query.dataFormat === 'table') {
    return { format: 'table', records, skipped: fetched.skipped };
  }

  const outputDir = options.outputDir ?? path.resolve('output');
  const file = path.join(outputDir, sessionsCsvFilename(query.fromYear, query.toYear));
  await writeCsvFile(file, toCsv(records, CLEAN_COLUMNS));
  await logger({ type: 'csv-written', path: file, rows: records.length });
  return { format: 'csv', path: file, rowCount: records.length, skipped: fetched.skipped };
}
