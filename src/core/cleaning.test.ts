import { describe, expect, it } from 'vitest';
import { CLEAN_COLUMNS, cleanSessionsRecords, cleanSessionsTable } from './cleaning.js';
import { createTrackLookup } from './track-lookup.js';

const lookup = createTrackLookup([
  { season: null, eventName: 'Indianapolis 500', trackName: 'Indianapolis Motor Speedway' },
  { season: 2023, eventName: 'Chevrolet Detroit Grand Prix', trackName: 'Streets of Detroit' },
]);

function rawRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    BestLapTime: '0:39.8123',
    BestSpeed: '226.054',
    BestSpeedFormatted: '226.054 mph',
    CarNumber: '30',
    Difference: '0.0000',
    DriverName: ' Takuma  Sato ',
    DriverOverrideID: null,
    DriversID: 1234,
    ElapsedTime: '3:10:05.0880',
    EventsEntrylistID: '555',
    EventsSessionsDetailsID: 9001,
    EventsSessionsID: 777,
    FirstName: 'Takuma',
    Gap: '-',
    IsDeleted: false,
    LapsComplete: '200',
    LapsDown: '0',
    LapsLed: '27',
    LastName: 'Sato',
    PitStops: '6',
    PointsEarned: '104',
    PositionFinish: '1',
    PositionStart: '3',
    SpeedAvg: '157.824',
    Status: 'Running   ',
    TimesLed: '4',
    EventName: 'Indianapolis 500',
    EventDate: '08/23/2020',
    EventType: 'Race',
    SessionType: 'R',
    TrackType: 'Oval',
    EventID: '4310',
    Season: 2020,
    ...overrides,
  };
}

describe('cleanSessionsRecords', () => {
  it('renames, coerces and joins the track name', () => {
    const [record] = cleanSessionsRecords([rawRow()], lookup);

    expect(record).toEqual({
      season: 2020,
      event_id: 4310,
      event_name: 'Indianapolis 500',
      event_date: new Date('2020-08-23T00:00:00.000Z'),
      event_type: 'Race',
      session_type: 'R',
      track_name: 'Indianapolis Motor Speedway',
      track_type: 'Oval',
      events_sessions_id: 777,
      events_sessions_details_id: 9001,
      events_entrylist_id: 555,
      drivers_id: 1234,
      driver_name: 'Takuma Sato',
      first_name: 'Takuma',
      last_name: 'Sato',
      car_number: 30,
      position_start: 3,
      position_finish: 1,
      position_change: 2,
      laps_complete: 200,
      laps_down: 0,
      laps_led: 27,
      times_led: 4,
      pit_stops: 6,
      points_earned: 104,
      status: 'Running',
      best_lap_time: 39.8123,
      elapsed_time: 11405.088,
      qual_lap_1: null,
      qual_lap_2: null,
      qual_lap_3: null,
      qual_lap_4: null,
      best_speed: 226.054,
      speed_avg: 157.824,
      gap: '-',
      difference: '0.0000',
      is_deleted: false,
    });
    expect(Object.keys(record)).toEqual([...CLEAN_COLUMNS]);
  });

  it('coerces a minute lap time to seconds', () => {
    const [record] = cleanSessionsRecords([rawRow({ BestLapTime: '1:23.4567' })], lookup);
    expect(record.best_lap_time).toBe(83.4567);
  });

  it('yields null for a missing car number', () => {
    const row = rawRow();
    delete row.CarNumber;
    const [record] = cleanSessionsRecords([row], lookup);
    expect(record.car_number).toBeNull();
  });

  it('turns placeholders into null without dropping the row', () => {
    const records = cleanSessionsRecords(
      [rawRow({ PositionStart: '-', LapsLed: '', BestLapTime: 'DNS', BestSpeed: 'n/a' })],
      lookup,
    );
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      position_start: null,
      position_change: null,
      laps_led: null,
      best_lap_time: null,
      best_speed: null,
    });
  });

  it('drops rows without a session identifier', () => {
    const result = cleanSessionsTable(
      [rawRow({ EventsSessionsID: null }), rawRow({ EventsSessionsID: 'abc' }), rawRow()],
      lookup,
    );
    expect(result.records).toHaveLength(1);
    expect(result.records.every((record) => record.events_sessions_id !== null)).toBe(true);
    expect(result.stats).toEqual({ input: 3, missingSessionId: 2, duplicates: 0, filtered: 0 });
  });

  it('uses season-specific track names', () => {
    const [record] = cleanSessionsRecords(
      [rawRow({ EventName: 'Chevrolet Detroit Grand Prix', Season: 2023, EventDate: '06/04/2023' })],
      lookup,
    );
    expect(record.track_name).toBe('Streets of Detroit');
  });

  it('keeps the source track name when the lookup has none', () => {
    const [record] = cleanSessionsRecords(
      [rawRow({ EventName: 'Grand Prix of Somewhere', TrackName: 'Somewhere Circuit' })],
      lookup,
    );
    expect(record.track_name).toBe('Somewhere Circuit');
  });

  it('derives the season from the event date', () => {
    const row = rawRow({ EventDate: '05/24/2015' });
    delete row.Season;
    const [record] = cleanSessionsRecords([row], lookup);
    expect(record.season).toBe(2015);
  });

  it('only computes position change for races', () => {
    const [record] = cleanSessionsRecords([rawRow({ SessionType: 'Q' })], lookup);
    expect(record.position_change).toBeNull();
  });

  it('removes duplicate entries and keeps input order', () => {
    const rows = [
      rawRow({ EventsSessionsDetailsID: 1, DriverName: 'A' }),
      rawRow({ EventsSessionsDetailsID: 2, DriverName: 'B' }),
      rawRow({ EventsSessionsDetailsID: 1, DriverName: 'A' }),
      rawRow({ EventsSessionsDetailsID: 3, DriverName: 'C' }),
    ];
    const result = cleanSessionsTable(rows, lookup);
    expect(result.records.map((record) => record.driver_name)).toEqual(['A', 'B', 'C']);
    expect(result.stats.duplicates).toBe(1);
  });

  it('falls back to car and driver when the details id is missing', () => {
    const rows = [
      rawRow({ EventsSessionsDetailsID: null, CarNumber: '5', DriverName: 'A' }),
      rawRow({ EventsSessionsDetailsID: null, CarNumber: '5', DriverName: 'A' }),
      rawRow({ EventsSessionsDetailsID: null, CarNumber: '6', DriverName: 'A' }),
    ];
    expect(cleanSessionsRecords(rows, lookup)).toHaveLength(2);
  });

  it('filters by session type when asked', () => {
    const rows = [
      rawRow({ EventsSessionsID: 1, SessionType: 'R' }),
      rawRow({ EventsSessionsID: 2, SessionType: 'P' }),
    ];
    const result = cleanSessionsTable(rows, lookup, { sessionType: 'P' });
    expect(result.records.map((record) => record.events_sessions_id)).toEqual([2]);
    expect(result.stats.filtered).toBe(1);
  });

  it('is idempotent', () => {
    const rows = [
      rawRow(),
      rawRow({ EventsSessionsDetailsID: 9002, DriverName: 'Scott&nbsp;Dixon', CarNumber: 'T9' }),
      rawRow({ EventsSessionsID: null }),
    ];
    const once = cleanSessionsRecords(rows, lookup);
    const twice = cleanSessionsRecords(once, lookup);
    expect(twice).toEqual(once);
  });

  it('decodes entities only once', () => {
    const rows = [
      rawRow({ EventsSessionsDetailsID: 9003, DriverName: 'A &amp;amp; B' }),
      rawRow({ EventsSessionsDetailsID: 9004, DriverName: '&amp;lt;b&amp;gt;' }),
    ];
    const once = cleanSessionsRecords(rows, lookup);
    const twice = cleanSessionsRecords(once, lookup);
    expect(once.map((record) => record.driver_name)).toEqual(['A &amp; B', '&lt;b&gt;']);
    expect(twice).toEqual(once);
  });

  it('keeps a row whose entity is out of range', () => {
    const [record] = cleanSessionsRecords([rawRow({ DriverName: 'Bad &#1114112; name' })], lookup);
    expect(record.driver_name).toBe('Bad &#1114112; name');
  });

  it('keeps anonymous rows instead of treating them as duplicates', () => {
    const anonymous = { EventsSessionsDetailsID: null, CarNumber: null, DriverName: null };
    const result = cleanSessionsTable([rawRow(anonymous), rawRow(anonymous)], lookup);
    expect(result.records).toHaveLength(2);
    expect(result.stats.duplicates).toBe(0);
  });

  it('accepts already-cleaned rows read back as strings', () => {
    const [record] = cleanSessionsRecords(
      [
        {
          season: '2020',
          events_sessions_id: '777',
          event_name: 'Indianapolis 500',
          event_date: '2020-08-23',
          session_type: 'R',
          best_lap_time: '39.8123',
          is_deleted: 'false',
          car_number: '',
        },
      ],
      lookup,
    );
    expect(record).toMatchObject({
      season: 2020,
      events_sessions_id: 777,
      event_date: new Date('2020-08-23T00:00:00.000Z'),
      track_name: 'Indianapolis Motor Speedway',
      best_lap_time: 39.8123,
      is_deleted: false,
      car_number: null,
    });
  });
});
