// lib/loader.ts

import { cutoffFor, localHour, MS_PER_HOUR, TIME_ZONE } from './format';
import { fetchLatestPrices, toPriceRecords, type Fetcher } from './porssisahko';
import { readCache, writeCache } from './store';
import type { PriceRecord } from './types';

export type RefreshPolicy = {
  refreshHour: number;      // tomorrow's prices are published in the afternoon
  minHorizonHours: number;
  timeZone?: string;
};

export type LoadOptions = RefreshPolicy & {
  url: string;
  cacheFile: string;
  now: Date;
  forceFetch: boolean;
  fetcher?: Fetcher;
};

// Stale when past the refresh hour and the cache does not reach far enough ahead
// of the current hour
export function isCacheStale(records: PriceRecord[], now: Date, policy: RefreshPolicy): boolean {
  if (records.length === 0) return true;
  if (localHour(now, policy.timeZone ?? TIME_ZONE) < policy.refreshHour) return false;

  const latest = Math.max(...records.map((r) => r.start.getTime()));
  const horizonHours = (latest - cutoffFor(now, 'hour').getTime()) / MS_PER_HOUR;
  return horizonHours < policy.minHorizonHours;
}

export async function loadPrices(options: LoadOptions): Promise<PriceRecord[]> {
  const cached = await readCache(options.cacheFile);

  if (cached && !options.forceFetch) {
    const records = toPriceRecords(cached);
    if (!isCacheStale(records, options.now, options)) {
      console.log(`Using cached prices from ${options.cacheFile} (${records.length} slots)`);
      return records;
    }
    console.log(`Cached prices in ${options.cacheFile} are stale`);
  }

  console.log(`Getting new spot price data from ${options.url}`);
  const { body, payload } = await fetchLatestPrices(options.url, options.fetcher);
  await writeCache(options.cacheFile, body);
  console.log(`Saved ${payload.prices.length} slots to ${options.cacheFile}`);

  return toPriceRecords(payload);
}
