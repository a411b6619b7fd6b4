import {
  cleanText,
  parseBoolean,
  parseDecimal,
  parseDurationSeconds,
  parseEventDate,
  parseInteger,
} from './coerce.js';
import type { SessionTypeFilter } from './query.js';
import type { TrackLookup } from './track-lookup.js';

export type CleanSessionRecord = {
  season: number | null;
  event_id: number | null;
  event_name: string | null;
  event_date: Date | null;
  event_type: string | null;
  session_type: string | null;
  track_name: string | null;
  track_type: string | null;
  events_sessions_id: number | null;
  events_sessions_details_id: number | null;
  events_entrylist_id: number | null;
  drivers_id: number | null;
  driver_name: string | null;
  first_name: string | null;
  last_name: string | null;
  car_number: number | null;
  position_start: number | null;
  position_finish: number | null;
  position_change: number | null;
  laps_complete: number | null;
  laps_down: number | null;
  laps_led: number | null;
  times_led: number | null;
  pit_stops: number | null;
  points_earned: number | null;
  status: string | null;
  best_lap_time: number | null;
  elapsed_time: number | null;
  qual_lap_1: number | null;
  qual_lap_2: number | null;
  qual_lap_3: number | null;
  qual_lap_4: number | null;
  best_speed: number | null;
  speed_avg: number | null;
  gap: string | null;
  difference: string | null;
  is_deleted: boolean | null;
};

export type CleanSessionTable = CleanSessionRecord[];

export type CleanColumn = keyof CleanSessionRecord;

export const CLEAN_COLUMNS = [
  'season',
  'event_id',
  'event_name',
  'event_date',
  'event_type',
  'session_type',
  'track_name',
  'track_type',
  'events_sessions_id',
  'events_sessions_details_id',
  'events_entrylist_id',
  'drivers_id',
  'driver_name',
  'first_name',
  'last_name',
  'car_number',
  'position_start',
  'position_finish',
  'position_change',
  'laps_complete',
  'laps_down',
  'laps_led',
  'times_led',
  'pit_stops',
  'points_earned',
  'status',
  'best_lap_time',
  'elapsed_time',
  'qual_lap_1',
  'qual_lap_2',
  'qual_lap_3',
  'qual_lap_4',
  'best_speed',
  'speed_avg',
  'gap',
  'difference',
  'is_deleted',
] as const satisfies readonly CleanColumn[];

// IndyStats labels, as served and as attached by the fetcher.
const SOURCE_COLUMNS: Partial<Record<CleanColumn, string>> = {
  season: 'Season',
  event_id: 'EventID',
  event_name: 'EventName',
  event_date: 'EventDate',
  event_type: 'EventType',
  session_type: 'SessionType',
  track_name: 'TrackName',
  track_type: 'TrackType',
  events_sessions_id: 'EventsSessionsID',
  events_sessions_details_id: 'EventsSessionsDetailsID',
  events_entrylist_id: 'EventsEntrylistID',
  drivers_id: 'DriversID',
  driver_name: 'DriverName',
  first_name: 'FirstName',
  last_name: 'LastName',
  car_number: 'CarNumber',
  position_start: 'PositionStart',
  position_finish: 'PositionFinish',
  laps_complete: 'LapsComplete',
  laps_down: 'LapsDown',
  laps_led: 'LapsLed',
  times_led: 'TimesLed',
  pit_stops: 'PitStops',
  points_earned: 'PointsEarned',
  status: 'Status',
  best_lap_time: 'BestLapTime',
  elapsed_time: 'ElapsedTime',
  qual_lap_1: 'QualLap1',
  qual_lap_2: 'QualLap2',
  qual_lap_3: 'QualLap3',
  qual_lap_4: 'QualLap4',
  best_speed: 'BestSpeed',
  speed_avg: 'SpeedAvg',
  gap: 'Gap',
  difference: 'Difference',
  is_deleted: 'IsDeleted',
};

export type CleanOptions = {
  sessionType?: SessionTypeFilter;
};

export type CleanStats = {
  input: number;
  missingSessionId: number;
  duplicates: number;
  filtered: number;
};

export type CleanResult = {
  records: CleanSessionTable;
  stats: CleanStats;
};

function pick(row: Record<string, unknown>, column: CleanColumn): unknown {
  const value = row[column];
  if (value !== undefined) return value;
  const source = SOURCE_COLUMNS[column];
  return source === undefined ? undefined : row[source];
}

function normalizeRow(
  row: Record<string, unknown>,
  lookup: TrackLookup,
): CleanSessionRecord {
  const get = (column: CleanColumn) => pick(row, column);
  // Clean columns have had their entities decoded already.
  const text = (column: CleanColumn) =>
    cleanText(get(column), { decodeEntities: row[column] === undefined });
  const eventDate = parseEventDate(get('event_date'));
  const season = parseInteger(get('season')) ?? eventDate?.getUTCFullYear() ?? null;
  const eventName = text('event_name');
  const sessionType = text('session_type');
  const positionStart = parseInteger(get('position_start'));
  const positionFinish = parseInteger(get('position_finish'));

  return {
    season,
    event_id: parseInteger(get('event_id')),
    event_name: eventName,
    event_date: eventDate,
    event_type: text('event_type'),
    session_type: sessionType,
    track_name: lookup.resolve(season, eventName) ?? text('track_name'),
    track_type: text('track_type'),
    events_sessions_id: parseInteger(get('events_sessions_id')),
    events_sessions_details_id: parseInteger(get('events_sessions_details_id')),
    events_entrylist_id: parseInteger(get('events_entrylist_id')),
    drivers_id: parseInteger(get('drivers_id')),
    driver_name: text('driver_name'),
    first_name: text('first_name'),
    last_name: text('last_name'),
    car_number: parseInteger(get('car_number')),
    position_start: positionStart,
    position_finish: positionFinish,
    position_change:
      sessionType === 'R' && positionStart !== null && positionFinish !== null
        ? positionStart - positionFinish
        : null,
    laps_complete: parseInteger(get('laps_complete')),
    laps_down: parseInteger(get('laps_down')),
    laps_led: parseInteger(get('laps_led')),
    times_led: parseInteger(get('times_led')),
    pit_stops: parseInteger(get('pit_stops')),
    points_earned: parseInteger(get('points_earned')),
    status: text('status'),
    best_lap_time: parseDurationSeconds(get('best_lap_time')),
    elapsed_time: parseDurationSeconds(get('elapsed_time')),
    qual_lap_1: parseDurationSeconds(get('qual_lap_1')),
    qual_lap_2: parseDurationSeconds(get('qual_lap_2')),
    qual_lap_3: parseDurationSeconds(get('qual_lap_3')),
    qual_lap_4: parseDurationSeconds(get('qual_lap_4')),
    best_speed: parseDecimal(get('best_speed')),
    speed_avg: parseDecimal(get('speed_avg')),
    gap: text('gap'),
    difference: text('difference'),
    is_deleted: parseBoolean(get('is_deleted')),
  };
}

// Rows with no details id, car or driver have nothing to match on and are all kept.
function dedupeKey(record: CleanSessionRecord): string | null {
  if (record.events_sessions_details_id !== null) {
    return `${record.events_sessions_id}|d${record.events_sessions_details_id}`;
  }
  if (record.car_number === null && record.driver_name === null) return null;
  return `${record.events_sessions_id}|${record.car_number ?? ''}|${record.driver_name ?? ''}`;
}

/**
 * Normalize raw IndyStats rows (or a previously cleaned table) into the
 * fixed schema, with counts of what was removed and why.
 */
export function cleanSessionsTable(
  table: ReadonlyArray<Record<string, unknown>>,
  lookup: TrackLookup,
  options: CleanOptions = {},
): CleanResult {
  const sessionType = options.sessionType ?? 'All';
  const stats: CleanStats = { input: table.length, missingSessionId: 0, duplicates: 0, filtered: 0 };
  const seen = new Set<string>();
  const records: CleanSessionTable = [];

  for (const row of table) {
    const record = normalizeRow(row, lookup);
    if (record.events_sessions_id === null) {
      stats.missingSessionId += 1;
      continue;
    }
    if (sessionType !== 'All' && record.session_type !== sessionType) {
      stats.filtered += 1;
      continue;
    }
    const key = dedupeKey(record);
    if (key !== null) {
      if (seen.has(key)) {
        stats.duplicates += 1;
        continue;
      }
      seen.add(key);
    }
    records.push(record);
  }

  return { records, stats };
}

export function cleanSessionsRecords(
  table: ReadonlyArray<Record<string, unknown>>,
  lookup: TrackLookup,
  options: CleanOptions = {},
): CleanSessionTable {
  return cleanSessionsTable(table, lookup, options).records;
}
