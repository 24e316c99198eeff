import type { PriceRecord } from '../lib/types';

const MINUTE_MS = 60 * 1000;

/**
 * Consecutive price records starting at `startIso`
 */
export function makeRecords(startIso: string, prices: number[], slotMinutes = 60): PriceRecord[] {
  const start = new Date(startIso).getTime();
  return prices.map((price, i) => ({
    start: new Date(start + i * slotMinutes * MINUTE_MS),
    price,
  }));
}

/**
 * API response body for the given records, newest first like porssisahko.net
 */
export function makeBody(records: PriceRecord[], slotMinutes = 60): string {
  const prices = [...records].reverse().map((r) => ({
    price: r.price,
    startDate: r.start.toISOString(),
    endDate: new Date(r.start.getTime() + slotMinutes * MINUTE_MS).toISOString(),
  }));
  return JSON.stringify({ prices });
}
