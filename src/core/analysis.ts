import type { CleanSessionRecord } from './cleaning.js';

type SessionRow = Pick<CleanSessionRecord, 'events_sessions_id' | 'status'>;

export type DriverRef = {
  driver_name: string;
  drivers_id: number;
};

export type WithRunningCars<T> = T & { running_cars: number };
export type WithFinishPercentile<T> = WithRunningCars<T> & { finish_percentile: number | null };
export type WithBestLapPercentage<T> = T & { best_lap_percentage: number | null };

export type RpiInput = Pick<
  CleanSessionRecord,
  | 'season'
  | 'events_sessions_id'
  | 'session_type'
  | 'driver_name'
  | 'status'
  | 'position_start'
  | 'position_finish'
  | 'points_earned'
> & { finish_percentile?: number | null };

export type RpiRow = {
  driver_name: string;
  season?: number | null;
  races_completed: number;
  average_starting_position: number | null;
  average_finish_position: number | null;
  finish_percentile_index: number | null;
  finish_rate: number;
  adj_finish_rate: number;
  points_earned: number;
  points_per_race: number;
  race_performance_index: number | null;
};

export type RpiOptions = {
  bySeason?: boolean;
  minRaces?: number;
};

const RUNNING = 'Running';
const MECHANICAL = 'Mechanical';

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

function sessionKey(row: SessionRow): string {
  return String(row.events_sessions_id);
}

function mean(values: Array<number | null>): number | null {
  const present = values.filter((value): value is number => value !== null);
  if (present.length === 0) return null;
  return present.reduce((acc, value) => acc + value, 0) / present.length;
}

/** Harmonic mean of two non-negative values; 0 when either is 0. */
export function harmonicMean(a: number, b: number): number {
  if (a === 0 || b === 0) return 0;
  return 2 / (1 / a + 1 / b);
}

export function getUniqueDrivers(
  table: ReadonlyArray<Pick<CleanSessionRecord, 'driver_name' | 'drivers_id'>>,
): DriverRef[] {
  const seen = new Set<string>();
  const drivers: DriverRef[] = [];
  for (const row of table) {
    if (row.driver_name === null || row.drivers_id === null) continue;
    const key = `${row.drivers_id}|${row.driver_name}`;
    if (seen.has(key)) continue;
    seen.add(key);
    drivers.push({ driver_name: row.driver_name, drivers_id: row.drivers_id });
  }
  return drivers;
}

export function addRunningCounts<T extends SessionRow>(table: readonly T[]): WithRunningCars<T>[] {
  const counts = new Map<string, number>();
  for (const row of table) {
    if (row.status !== RUNNING) continue;
    const key = sessionKey(row);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return table.map((row) => ({ ...row, running_cars: counts.get(sessionKey(row)) ?? 0 }));
}

/**
 * Rank running cars within their session (ties share the lowest rank) and
 * express it as a percentile: the winner scores 100, the last runner 0.
 */
export function addFinishPercentile<
  T extends SessionRow & Pick<CleanSessionRecord, 'position_finish'>,
>(table: readonly T[]): WithFinishPercentile<T>[] {
  const finishes = new Map<string, number[]>();
  for (const row of table) {
    if (row.status !== RUNNING || row.position_finish === null) continue;
    const key = sessionKey(row);
    const list = finishes.get(key) ?? [];
    list.push(row.position_finish);
    finishes.set(key, list);
  }

  return addRunningCounts(table).map((row) => {
    if (row.status !== RUNNING || row.position_finish === null || row.running_cars < 2) {
      return { ...row, finish_percentile: null };
    }
    const finish = row.position_finish;
    const ahead = (finishes.get(sessionKey(row)) ?? []).filter((value) => value < finish).length;
    const rank = ahead + 1;
    const percentile = ((row.running_cars - rank) / (row.running_cars - 1)) * 100;
    return { ...row, finish_percentile: roundTo(percentile, 2) };
  });
}

export function addRelativeBestLap<
  T extends Pick<CleanSessionRecord, 'events_sessions_id' | 'best_speed'>,
>(table: readonly T[]): WithBestLapPercentage<T>[] {
  const best = new Map<string, number>();
  for (const row of table) {
    if (row.best_speed === null) continue;
    const key = String(row.events_sessions_id);
    best.set(key, Math.max(best.get(key) ?? 0, row.best_speed));
  }
  return table.map((row) => {
    const top = best.get(String(row.events_sessions_id));
    const percentage =
      row.best_speed === null || top === undefined || top === 0
        ? null
        : roundTo((row.best_speed / top) * 100, 2);
    return { ...row, best_lap_percentage: percentage };
  });
}

function withPercentiles(table: readonly RpiInput[]): Array<RpiInput & { finish_percentile: number | null }> {
  const hasPercentiles = table.every((row) => row.finish_percentile !== undefined);
  if (hasPercentiles) {
    return table.map((row) => ({ ...row, finish_percentile: row.finish_percentile ?? null }));
  }
  return addFinishPercentile(table);
}

function compareRpi(a: RpiRow, b: RpiRow): number {
  if (a.race_performance_index !== b.race_performance_index) {
    if (a.race_performance_index === null) return 1;
    if (b.race_performance_index === null) return -1;
    return b.race_performance_index - a.race_performance_index;
  }
  const byName = a.driver_name.localeCompare(b.driver_name);
  if (byName !== 0) return byName;
  return (a.season ?? 0) - (b.season ?? 0);
}

/**
 * Race Performance Index per driver (or per driver and season): the harmonic
 * mean of the average finish percentile and the finish rate with mechanical
 * retirements excluded.
 */
export function getRpiTable(table: readonly RpiInput[], options: RpiOptions = {}): RpiRow[] {
  const bySeason = options.bySeason ?? false;
  const minRaces = options.minRaces ?? 0;

  const groups = new Map<string, Array<RpiInput & { finish_percentile: number | null }>>();
  for (const row of withPercentiles(table)) {
    if (row.session_type !== 'R' || row.driver_name === null) continue;
    const key = bySeason ? `${row.season ?? ''}|${row.driver_name}` : row.driver_name;
    const list = groups.get(key) ?? [];
    list.push(row);
    groups.set(key, list);
  }

  const rows: RpiRow[] = [];
  for (const races of groups.values()) {
    const [first] = races;
    if (!first || first.driver_name === null) continue;
    const total = races.length;
    const running = races.filter((race) => race.status === RUNNING).length;
    const mechanical = races.filter((race) => race.status === MECHANICAL).length;
    const finishPercentileIndex = mean(races.map((race) => race.finish_percentile));
    const adjFinishRate = total - mechanical === 0 ? 0 : (running / (total - mechanical)) * 100;
    const pointsEarned = races.reduce((acc, race) => acc + (race.points_earned ?? 0), 0);
    const averageStart = mean(races.map((race) => race.position_start));
    const averageFinish = mean(races.map((race) => race.position_finish));

    rows.push({
      driver_name: first.driver_name,
      ...(bySeason ? { season: first.season } : {}),
      races_completed: total,
      average_starting_position: averageStart === null ? null : roundTo(averageStart, 1),
      average_finish_position: averageFinish === null ? null : roundTo(averageFinish, 1),
      finish_percentile_index:
        finishPercentileIndex === null ? null : roundTo(finishPercentileIndex, 2),
      finish_rate: roundTo((running / total) * 100, 2),
      adj_finish_rate: roundTo(adjFinishRate, 2),
      points_earned: pointsEarned,
      points_per_race: roundTo(pointsEarned / total, 1),
      race_performance_index:
        finishPercentileIndex === null
          ? null
          : roundTo(harmonicMean(finishPercentileIndex, adjFinishRate), 2),
    });
  }

  return rows.filter((row) => row.races_completed >= minRaces).sort(compareRpi);
}
