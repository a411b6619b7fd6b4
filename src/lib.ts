export {
  fetchSessionsRecords,
  filterSessionsByType,
  getSessionsRecords,
  listSessions,
  DEFAULT_REQUEST_DELAY_MS,
  type FetchDeps,
  type FetchProgress,
  type FetchSessionsResult,
  type GetSessionsOptions,
  type SessionsRecordsResult,
} from './core/sessions.js';
export {
  CLEAN_COLUMNS,
  cleanSessionsRecords,
  cleanSessionsTable,
  type CleanColumn,
  type CleanOptions,
  type CleanResult,
  type CleanSessionRecord,
  type CleanSessionTable,
  type CleanStats,
} from './core/cleaning.js';
export {
  addFinishPercentile,
  addRelativeBestLap,
  addRunningCounts,
  getRpiTable,
  getUniqueDrivers,
  harmonicMean,
  type DriverRef,
  type RpiInput,
  type RpiOptions,
  type RpiRow,
} from './core/analysis.js';
export {
  parseCsv,
  readCsvRecords,
  rowsToRecords,
  sessionsCsvFilename,
  toCsv,
  writeCsvFile,
} from './core/csv.js';
export {
  createTrackLookup,
  loadTrackLookup,
  parseTrackTable,
  DEFAULT_TRACK_TABLE_PATH,
  type TrackLookup,
  type TrackLookupEntry,
} from './core/track-lookup.js';
export {
  getSeasonIndex,
  getSessionDetails,
  DEFAULT_BASE_URL,
  type ApiOptions,
  type FetchOutcome,
} from './core/indystats-api.js';
export {
  parseSessionQuery,
  DATA_FORMATS,
  EARLIEST_SEASON,
  SESSION_TYPES,
  type DataFormat,
  type SessionQuery,
  type SessionQueryInput,
  type SessionTypeFilter,
} from './core/query.js';
export {
  ConfigError,
  InvalidSessionQueryError,
  RunAbortedError,
  SourceUnavailableError,
} from './core/errors.js';
export { createRunLogger, type LogEvent, type RunLogger } from './core/logger.js';
export { resolveConfig, type ResolvedConfig } from './core/config.js';
export type {
  RawSessionRecord,
  SessionDetails,
  SessionRef,
  SkippedSession,
} from './core/types.js';
