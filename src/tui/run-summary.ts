import type { SessionsRecordsResult } from '../core/sessions.js';
import { formatTable } from '../core/text-table.js';
import type { SkippedSession } from '../core/types.js';

export const PREVIEW_ROWS = 8;

const PREVIEW_COLUMNS = [
  'season',
  'event_name',
  'session_type',
  'driver_name',
  'position_finish',
  'status',
] as const;

export type RunSummary = {
  rowCount: number;
  skipped: SkippedSession[];
  path: string | null;
  preview: string | null;
};

export function summarizeRun(result: SessionsRecordsResult): RunSummary {
  if (result.format === 'csv') {
    return { rowCount: result.rowCount, skipped: result.skipped, path: result.path, preview: null };
  }
  return {
    rowCount: result.records.length,
    skipped: result.skipped,
    path: null,
    preview:
      result.records.length > 0
        ? formatTable(result.records.slice(0, PREVIEW_ROWS), PREVIEW_COLUMNS)
        : null,
  };
}
