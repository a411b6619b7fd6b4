import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { cleanText, parseInteger } from './coerce.js';
import { parseCsv } from './csv.js';

export const DEFAULT_TRACK_TABLE_PATH = fileURLToPath(
  new URL('../../data/race_track.csv', import.meta.url),
);

export type TrackLookupEntry = {
  // null applies the entry to every season.
  season: number | null;
  eventName: string;
  trackName: string;
};

export type TrackLookup = {
  readonly size: number;
  resolve: (season: number | null, eventName: string | null) => string | null;
  entries: () => readonly TrackLookupEntry[];
};

function eventKey(eventName: string): string {
  return eventName.toLowerCase();
}

export function createTrackLookup(entries: Iterable<TrackLookupEntry>): TrackLookup {
  const bySeason = new Map<string, string>();
  const anySeason = new Map<string, string>();
  const kept: TrackLookupEntry[] = [];

  for (const entry of entries) {
    const eventName = cleanText(entry.eventName);
    const trackName = cleanText(entry.trackName);
    if (!eventName || !trackName) continue;
    const key = eventKey(eventName);
    if (entry.season === null) {
      if (anySeason.has(key)) continue;
      anySeason.set(key, trackName);
    } else {
      const seasonKey = `${entry.season}|${key}`;
      if (bySeason.has(seasonKey)) continue;
      bySeason.set(seasonKey, trackName);
    }
    kept.push(Object.freeze({ season: entry.season, eventName, trackName }));
  }
  const frozen = Object.freeze(kept);

  return {
    size: frozen.length,
    resolve: (season, eventName) => {
      const name = cleanText(eventName);
      if (!name) return null;
      const key = eventKey(name);
      if (season !== null) {
        const exact = bySeason.get(`${season}|${key}`);
        if (exact) return exact;
      }
      return anySeason.get(key) ?? null;
    },
    entries: () => frozen,
  };
}

/**
 * Parse the `;`-separated reference table. Expected headers are Season
 * (optional), EventName and TrackName, matched case-insensitively.
 */
export function parseTrackTable(text: string): TrackLookupEntry[] {
  const [headers, ...rows] = parseCsv(text, ';');
  if (!headers) return [];
  const index = new Map(headers.map((header, i) => [header.trim().toLowerCase(), i]));
  const eventCol = index.get('eventname');
  const trackCol = index.get('trackname');
  const seasonCol = index.get('season');
  if (eventCol === undefined || trackCol === undefined) {
    throw new Error('Track table must have EventName and TrackName columns');
  }

  const out: TrackLookupEntry[] = [];
  for (const row of rows) {
    const eventName = cleanText(row[eventCol]);
    const trackName = cleanText(row[trackCol]);
    if (!eventName || !trackName) continue;
    const season = seasonCol === undefined ? null : parseInteger(row[seasonCol]);
    out.push({ season, eventName, trackName });
  }
  return out;
}

export async function loadTrackLookup(
  file: string = DEFAULT_TRACK_TABLE_PATH,
): Promise<TrackLookup> {
  const text = await fs.readFile(file, 'utf-8');
  return createTrackLookup(parseTrackTable(text));
}
