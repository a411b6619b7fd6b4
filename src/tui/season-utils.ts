import { EARLIEST_SEASON } from '../core/query.js';

/** Seasons from `currentYear` back to `earliest`, newest first. */
export function getSeasonOptions(currentYear: number, earliest: number = EARLIEST_SEASON): number[] {
  const length = Math.max(currentYear - earliest + 1, 0);
  return Array.from({ length }, (_, index) => currentYear - index);
}
