// lib/table.ts

import { barScale, quarterRanges, renderBar, renderRangeBar } from './bars';
import { DataIntegrityError } from './errors';
import { cutoffFor, formatDay, formatHour, formatPrice, roundPrice, TIME_ZONE } from './format';
import type { ColumnKey, DisplayColumn, PriceRecord, PriceTable, Resolution } from './types';

export const COLUMN_KEYS: ColumnKey[] = ['date', 'hour', 'price', 'bar'];

export type TableOptions = {
  cutoff: Date;
  showHistory: boolean;
  resolution: Resolution;
  barMaxWidth: number;
  vatLabel: string;
  // 15-minute prices for the min/max markers on hourly rows
  quarterPrices?: PriceRecord[];
  timeZone?: string;
};

export function selectRecords(
  records: PriceRecord[],
  cutoff: Date,
  showHistory: boolean
): PriceRecord[] {
  return [...records]
    .sort((a, b) => a.start.getTime() - b.start.getTime())
    .filter((r) => showHistory || r.start.getTime() >= cutoff.getTime());
}

export function buildPriceTable(records: PriceRecord[], options: TableOptions): PriceTable {
  const timeZone = options.timeZone ?? TIME_ZONE;
  const rows = selectRecords(records, options.cutoff, options.showHistory);
  if (rows.length === 0) {
    throw new DataIntegrityError('No prices left to show after filtering');
  }

  const prices = rows.map((r) => roundPrice(r.price));
  const scale = barScale(prices, options.barMaxWidth);

  const ranges =
    options.resolution === 'hour' && options.quarterPrices
      ? quarterRanges(rows, options.quarterPrices)
      : null;

  const bars = rows.map((r, i) => {
    const range = ranges?.get(r.start.getTime());
    return range ? renderRangeBar(prices[i], range, scale) : renderBar(prices[i], scale);
  });

  const table: PriceTable = {
    date: {
      header: 'Päivä',
      values: rows.map((r) => formatDay(r.start, timeZone)),
      suppressRepeat: true,
    },
    // The clock hour shown once per hour; the autumn repeat of 03 is a different hour
    hour: {
      header: 'Tunti',
      values: rows.map((r) => formatHour(r.start, timeZone)),
      suppressRepeat: true,
      repeatKeys: rows.map((r) => cutoffFor(r.start, 'hour').getTime()),
    },
    price: {
      header: 'Hinta',
      values: rows.map((r) => formatPrice(r.price)),
      suppressRepeat: false,
    },
    bar: {
      header: `(snt/kWh, ${options.vatLabel})`,
      values: bars,
      suppressRepeat: false,
    },
  };

  tableLength(table);
  return table;
}

export function tableLength(table: PriceTable): number {
  const lengths = COLUMN_KEYS.map((key) => table[key].values.length);
  if (lengths.some((n) => n !== lengths[0])) {
    throw new DataIntegrityError(`Table columns differ in length: ${lengths.join(', ')}`);
  }
  return lengths[0];
}

// Values as shown: repeats blanked where the column asks for it
export function displayValues(column: DisplayColumn): string[] {
  if (!column.suppressRepeat) return column.values;
  const keys = column.repeatKeys;
  return column.values.map((v, i) => {
    if (i === 0) return v;
    const repeated = keys ? keys[i - 1] === keys[i] : column.values[i - 1] === v;
    return repeated ? '' : v;
  });
}

function sliceColumn(column: DisplayColumn, start: number, end: number): DisplayColumn {
  return {
    ...column,
    values: column.values.slice(start, end),
    repeatKeys: column.repeatKeys?.slice(start, end),
  };
}

function sliceTable(table: PriceTable, start: number, end: number): PriceTable {
  return {
    date: sliceColumn(table.date, start, end),
    hour: sliceColumn(table.hour, start, end),
    price: sliceColumn(table.price, start, end),
    bar: sliceColumn(table.bar, start, end),
  };
}

// Two blocks, the second one starting at ceil(n/2)
export function splitTable(table: PriceTable): [PriceTable, PriceTable] {
  const n = tableLength(table);
  const mid = Math.ceil(n / 2);
  return [sliceTable(table, 0, mid), sliceTable(table, mid, n)];
}
