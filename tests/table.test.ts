import { BAR_CHAR, MAX_MARKER, MIN_MARKER, NEGATIVE_MARKER } from '../lib/bars';
import { DataIntegrityError } from '../lib/errors';
import {
  buildPriceTable,
  displayValues,
  selectRecords,
  splitTable,
  tableLength,
  type TableOptions,
} from '../lib/table';
import type { PriceTable } from '../lib/types';
import { makeRecords } from './helpers';

const baseOptions: TableOptions = {
  cutoff: new Date('2025-02-03T20:00:00Z'),
  showHistory: false,
  resolution: 'hour',
  barMaxWidth: 20,
  vatLabel: 'alv. 25,5 %',
};

// 22:00 and 23:00 on Monday, 00:00 and 01:00 on Tuesday (Helsinki)
const evening = makeRecords('2025-02-03T20:00:00Z', [5, 10, 2.5, -1]);

describe('Price table', () => {
  describe('selectRecords', () => {
    test('sorts by start time and drops slots before the cutoff', () => {
      const shuffled = [evening[2], evening[0], evening[3], evening[1]];
      const selected = selectRecords(shuffled, new Date('2025-02-03T21:00:00Z'), false);
      expect(selected.map((r) => r.price)).toEqual([10, 2.5, -1]);
    });

    test('keeps everything when history is shown', () => {
      const selected = selectRecords(evening, new Date('2025-02-03T23:00:00Z'), true);
      expect(selected).toHaveLength(4);
    });
  });

  describe('buildPriceTable', () => {
    test('formats every column for hourly prices', () => {
      const table = buildPriceTable(evening, baseOptions);

      expect(table.date.values).toEqual(['ma 3.2.', 'ma 3.2.', 'ti 4.2.', 'ti 4.2.']);
      expect(table.hour.values).toEqual(['22', '23', '00', '01']);
      expect(table.price.values).toEqual(['5.00', '10.00', '2.50', '-1.00']);
      expect(table.bar.values).toEqual([
        BAR_CHAR.repeat(10),
        BAR_CHAR.repeat(20),
        BAR_CHAR.repeat(5),
        NEGATIVE_MARKER,
      ]);
    });

    test('names the columns', () => {
      const table = buildPriceTable(evening, baseOptions);
      expect([table.date.header, table.hour.header, table.price.header, table.bar.header]).toEqual([
        'Päivä',
        'Tunti',
        'Hinta',
        '(snt/kWh, alv. 25,5 %)',
      ]);
    });

    test('shows a date only on the first row of that date', () => {
      const table = buildPriceTable(evening, baseOptions);
      expect(displayValues(table.date)).toEqual(['ma 3.2.', '', 'ti 4.2.', '']);
      expect(displayValues(table.price)).toEqual(['5.00', '10.00', '2.50', '-1.00']);
    });

    test('shows the hour once per hour on quarter prices', () => {
      const quarters = makeRecords('2025-02-03T10:00:00Z', [1, 2, 3, 4, 5, 6, 7, 8], 15);
      const table = buildPriceTable(quarters, {
        ...baseOptions,
        cutoff: new Date('2025-02-03T10:00:00Z'),
        resolution: 'quarter',
      });

      expect(table.hour.header).toBe('Tunti');
      expect(table.hour.values).toEqual(['12', '12', '12', '12', '13', '13', '13', '13']);
      expect(displayValues(table.hour)).toEqual(['12', '', '', '', '13', '', '', '']);
    });

    test('keeps both 03 rows when summer time ends', () => {
      // 03:00 EEST, then 03:00 EET an hour later
      const night = makeRecords('2025-10-25T23:00:00Z', [1, 2, 3, 4]);
      const table = buildPriceTable(night, {
        ...baseOptions,
        cutoff: new Date('2025-10-25T23:00:00Z'),
      });

      expect(table.hour.values).toEqual(['02', '03', '03', '04']);
      expect(displayValues(table.hour)).toEqual(['02', '03', '03', '04']);
      expect(displayValues(table.date)).toEqual(['su 26.10.', '', '', '']);
    });

    test('marks the quarter minimum and maximum on hourly rows', () => {
      const hours = makeRecords('2025-02-03T10:00:00Z', [4]);
      const quarters = makeRecords('2025-02-03T10:00:00Z', [2, 3, 5, 6], 15);
      const table = buildPriceTable(hours, {
        ...baseOptions,
        cutoff: new Date('2025-02-03T10:00:00Z'),
        barMaxWidth: 4,
        quarterPrices: quarters,
      });

      expect(table.bar.values).toEqual([
        `${BAR_CHAR}${MIN_MARKER}${BAR_CHAR}${BAR_CHAR}\u00a0${MAX_MARKER}`,
      ]);
    });

    test('fails when quarter prices do not cover an hour', () => {
      const hours = makeRecords('2025-02-03T10:00:00Z', [4, 5]);
      const quarters = makeRecords('2025-02-03T10:00:00Z', [2, 3, 5, 6], 15);

      expect(() =>
        buildPriceTable(hours, {
          ...baseOptions,
          cutoff: new Date('2025-02-03T10:00:00Z'),
          quarterPrices: quarters,
        })
      ).toThrow(DataIntegrityError);
    });

    test('fails when nothing is left after filtering', () => {
      expect(() =>
        buildPriceTable(evening, { ...baseOptions, cutoff: new Date('2025-02-04T00:00:00Z') })
      ).toThrow('No prices left to show after filtering');
    });
  });

  describe('tableLength', () => {
    test('returns the shared row count', () => {
      expect(tableLength(buildPriceTable(evening, baseOptions))).toBe(4);
    });

    test('throws when the columns differ in length', () => {
      const table = buildPriceTable(evening, baseOptions);
      const broken: PriceTable = { ...table, bar: { ...table.bar, values: table.bar.values.slice(1) } };

      expect(() => tableLength(broken)).toThrow('Table columns differ in length: 4, 4, 4, 3');
    });
  });

  describe('splitTable', () => {
    test('restarts quarter hour suppression in the second block', () => {
      const quarters = makeRecords('2025-02-03T10:15:00Z', [1, 2, 3, 4, 5, 6], 15);
      const table = buildPriceTable(quarters, {
        ...baseOptions,
        cutoff: new Date('2025-02-03T10:15:00Z'),
        resolution: 'quarter',
      });
      const [first, second] = splitTable(table);

      expect(displayValues(first.hour)).toEqual(['12', '', '']);
      expect(displayValues(second.hour)).toEqual(['13', '', '']);
    });

    const options: TableOptions = { ...baseOptions, cutoff: new Date('2025-02-03T22:00:00Z') };

    test('splits 40 rows into 20 and 20', () => {
      const records = makeRecords('2025-02-03T22:00:00Z', new Array<number>(40).fill(3));
      const [first, second] = splitTable(buildPriceTable(records, options));

      expect(tableLength(first)).toBe(20);
      expect(tableLength(second)).toBe(20);
    });

    test('splits 41 rows into 21 and 20', () => {
      const records = makeRecords('2025-02-03T22:00:00Z', new Array<number>(41).fill(3));
      const [first, second] = splitTable(buildPriceTable(records, options));

      expect(tableLength(first)).toBe(21);
      expect(tableLength(second)).toBe(20);
      expect(second.hour.values[0]).toBe('21');
    });

    test('repeats the date at the top of the second block', () => {
      const records = makeRecords('2025-02-03T22:00:00Z', new Array<number>(41).fill(3));
      const [first, second] = splitTable(buildPriceTable(records, options));

      expect(displayValues(first.date)[20]).toBe('');
      expect(displayValues(second.date)[0]).toBe('ti 4.2.');
      expect(displayValues(second.date)[3]).toBe('ke 5.2.');
    });
  });
});
