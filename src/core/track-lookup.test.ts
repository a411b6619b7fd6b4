import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { createTrackLookup, loadTrackLookup, parseTrackTable } from './track-lookup.js';

describe('createTrackLookup', () => {
  const lookup = createTrackLookup([
    { season: null, eventName: 'Chevrolet Detroit Grand Prix', trackName: 'Raceway at Belle Isle Park' },
    { season: 2023, eventName: 'Chevrolet Detroit Grand Prix', trackName: 'Streets of Detroit' },
    { season: null, eventName: 'Indianapolis 500', trackName: 'Indianapolis Motor Speedway' },
  ]);

  it('prefers season-specific entries', () => {
    expect(lookup.resolve(2023, 'Chevrolet Detroit Grand Prix')).toBe('Streets of Detroit');
    expect(lookup.resolve(2019, 'Chevrolet Detroit Grand Prix')).toBe('Raceway at Belle Isle Park');
  });

  it('matches event names ignoring case and stray whitespace', () => {
    expect(lookup.resolve(2020, '  indianapolis   500 ')).toBe('Indianapolis Motor Speedway');
    expect(lookup.resolve(null, 'INDIANAPOLIS 500')).toBe('Indianapolis Motor Speedway');
  });

  it('returns null for unknown or missing events', () => {
    expect(lookup.resolve(2020, 'Grand Prix of Nowhere')).toBeNull();
    expect(lookup.resolve(2020, null)).toBeNull();
  });

  it('keeps the first entry for a repeated key and freezes entries', () => {
    const repeated = createTrackLookup([
      { season: null, eventName: 'Iowa Corn 300', trackName: 'Iowa Speedway' },
      { season: null, eventName: 'iowa corn 300', trackName: 'Somewhere Else' },
    ]);
    expect(repeated.size).toBe(1);
    expect(repeated.resolve(2012, 'Iowa Corn 300')).toBe('Iowa Speedway');
    expect(Object.isFrozen(repeated.entries())).toBe(true);
  });
});

describe('parseTrackTable', () => {
  it('reads season, event and track columns', () => {
    const entries = parseTrackTable(
      'Season;EventName;TrackName\n;Indy 500;Indianapolis Motor Speedway\n2023;Detroit GP;Streets of Detroit\n;;\n',
    );
    expect(entries).toEqual([
      { season: null, eventName: 'Indy 500', trackName: 'Indianapolis Motor Speedway' },
      { season: 2023, eventName: 'Detroit GP', trackName: 'Streets of Detroit' },
    ]);
  });

  it('accepts tables without a season column', () => {
    expect(parseTrackTable('EventName;TrackName\nIndy 500;IMS\n')).toEqual([
      { season: null, eventName: 'Indy 500', trackName: 'IMS' },
    ]);
  });

  it('rejects tables without the required columns', () => {
    expect(() => parseTrackTable('Event;Track\nIndy 500;IMS\n')).toThrow(
      'Track table must have EventName and TrackName columns',
    );
  });
});

describe('loadTrackLookup', () => {
  it('loads the bundled reference table', async () => {
    const lookup = await loadTrackLookup();
    expect(lookup.size).toBeGreaterThan(0);
    expect(lookup.resolve(2024, 'Chevrolet Detroit Grand Prix')).toBe('Streets of Detroit');
    expect(lookup.resolve(2021, 'Indianapolis 500')).toBe('Indianapolis Motor Speedway');
  });

  it('loads a table from a given path', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'indystats-'));
    const file = path.join(dir, 'tracks.csv');
    writeFileSync(file, 'EventName;TrackName\nTest GP;Test Circuit\n');
    const lookup = await loadTrackLookup(file);
    expect(lookup.resolve(2020, 'Test GP')).toBe('Test Circuit');
  });
});
