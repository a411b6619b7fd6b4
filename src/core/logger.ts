import fs from 'node:fs';
import path from 'node:path';

export type LogEvent = Record<string, unknown> & { type: string };

export type RunLogger = (event: LogEvent) => Promise<void>;

type CreateRunLoggerOptions = {
  dataDir: string;
  now?: () => Date;
  mkdir?: typeof fs.promises.mkdir;
  appendFile?: typeof fs.promises.appendFile;
};

export const LOG_EVENT_TYPES = new Set([
  'fetch-start',
  'season-index',
  'session-fetched',
  'session-skipped',
  'fetch-finish',
  'rows-dropped',
  'csv-written',
]);

export const noopLogger: RunLogger = async () => {};

export function createRunLogger({
  dataDir,
  now = () => new Date(),
  mkdir = fs.promises.mkdir,
  appendFile = fs.promises.appendFile,
}: CreateRunLoggerOptions): { logPath: string; logger: RunLogger } {
  const logDir = path.join(dataDir, 'logs');
  const logPath = path.join(logDir, 'indystats.log');

  const logger: RunLogger = async (event) => {
    if (!LOG_EVENT_TYPES.has(event.type)) return;
    const line = `${JSON.stringify({ time: now().toISOString(), ...event })}\n`;
    try {
      await mkdir(logDir, { recursive: true });
      await appendFile(logPath, line, 'utf-8');
    } catch {
      // Logging must never fail a fetch.
    }
  };

  return { logPath, logger };
}
