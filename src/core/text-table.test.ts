import { describe, expect, it } from 'vitest';
import { formatTable } from './text-table.js';

describe('formatTable', () => {
  it('pads text left and numbers right', () => {
    const table = formatTable(
      [
        { driver: 'Palou', points: 656, date: new Date(Date.UTC(2024, 8, 15)) },
        { driver: 'Power', points: null, date: null },
      ],
      ['driver', 'points', 'date'],
    );
    expect(table.split('\n')).toEqual([
      'driver  points  date',
      '------  ------  ----------',
      'Palou      656  2024-09-15',
      'Power',
    ]);
  });

  it('prints only the header for no rows', () => {
    const empty: Array<{ a: number }> = [];
    expect(formatTable(empty, ['a'])).toBe('a\n-');
  });
});
