// lib/bars.ts

import { DataIntegrityError } from './errors';
import { MS_PER_HOUR, SLOT_MS } from './format';
import type { PriceRecord } from './types';

export const BAR_CHAR = '█';
export const NEGATIVE_MARKER = '▿';
export const MIN_MARKER = '▒';
export const MAX_MARKER = '▏';

// HTML collapses ordinary spaces inside the bar cell
const GAP = '\u00a0';

const QUARTERS_PER_HOUR = MS_PER_HOUR / SLOT_MS.quarter;

export type PriceRange = {
  min: number;
  max: number;
};

export function barScale(prices: number[], targetWidth: number): number {
  const max = prices.length > 0 ? Math.max(...prices) : 0;
  return max > 0 ? targetWidth / max : 1;
}

export function barLength(price: number, scale: number): number {
  return Math.max(0, Math.round(price * scale));
}

export function renderBar(price: number, scale: number): string {
  if (price < 0) return NEGATIVE_MARKER;
  return BAR_CHAR.repeat(barLength(price, scale));
}

// Bar for an hourly price, with the cheapest and the most expensive quarter of the hour marked
export function renderRangeBar(price: number, range: PriceRange, scale: number): string {
  if (price < 0) return NEGATIVE_MARKER;

  const length = barLength(price, scale);
  const minPos = barLength(range.min, scale);
  const maxPos = barLength(range.max, scale);

  const cells: string[] = [];
  for (let i = 0; i < Math.max(length, maxPos); i++) {
    cells.push(i < length ? BAR_CHAR : GAP);
  }
  if (minPos > 0) cells[minPos - 1] = MIN_MARKER;
  if (maxPos > 0) cells[maxPos - 1] = MAX_MARKER;

  return cells.join('');
}

// min/max of the four quarter prices inside each hourly slot, keyed by slot start (ms)
export function quarterRanges(
  hours: PriceRecord[],
  quarters: PriceRecord[]
): Map<number, PriceRange> {
  const byHour = new Map<number, number[]>();
  for (const h of hours) {
    byHour.set(h.start.getTime(), []);
  }
  for (const q of quarters) {
    const hourStart = Math.floor(q.start.getTime() / MS_PER_HOUR) * MS_PER_HOUR;
    byHour.get(hourStart)?.push(q.price);
  }

  const ranges = new Map<number, PriceRange>();
  for (const [start, prices] of byHour) {
    if (prices.length !== QUARTERS_PER_HOUR) {
      throw new DataIntegrityError(
        `Expected ${QUARTERS_PER_HOUR} quarter prices for the hour starting ${new Date(start).toISOString()}, got ${prices.length}`
      );
    }
    ranges.set(start, { min: Math.min(...prices), max: Math.max(...prices) });
  }
  return ranges;
}
