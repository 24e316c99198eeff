// lib/config.ts

import { resolve } from 'path';
import { TIME_ZONE } from './format';
import type { BlockOrder, Resolution } from './types';

export type FeedConfig = {
  url: string;
  cacheFile: string;
};

export type SiteConfig = {
  timeZone: string;
  outputDir: string;
  feeds: Record<Resolution, FeedConfig>;
  barMaxWidth: number;      // characters
  showHistory: boolean;     // false: the table starts from the current slot
  forceFetch: boolean;      // false: fetch only when the cache is missing or stale
  refreshHour: number;      // local hour after which tomorrow's prices are expected
  minHorizonHours: number;
  splitThreshold: number;   // rows before a horizontal page splits into two blocks
  blockOrder: BlockOrder;
  showQuarterRange: boolean;
  vatLabel: string;
};

export const LATEST_PRICES_URL: Record<Resolution, string> = {
  hour: 'https://api.porssisahko.net/v1/latest-prices.json',
  quarter: 'https://api.porssisahko.net/v2/latest-prices.json',
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number (got "${raw}")`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`${name} must be true or false (got "${raw}")`);
}

function readBlockOrder(env: NodeJS.ProcessEnv): BlockOrder {
  const raw = env.SPOT_BLOCK_ORDER;
  if (raw === undefined || raw === '') return 'ltr';
  if (raw === 'ltr' || raw === 'rtl') return raw;
  throw new Error(`SPOT_BLOCK_ORDER must be ltr or rtl (got "${raw}")`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SiteConfig {
  const cacheDir = resolve(env.SPOT_CACHE_DIR || process.cwd());

  const refreshHour = readNumber(env, 'SPOT_REFRESH_HOUR', 14);
  if (!Number.isInteger(refreshHour) || refreshHour < 0 || refreshHour > 23) {
    throw new Error(`SPOT_REFRESH_HOUR must be an hour 0-23 (got ${refreshHour})`);
  }

  const barMaxWidth = readNumber(env, 'SPOT_BAR_WIDTH', 23);
  if (barMaxWidth <= 0) {
    throw new Error(`SPOT_BAR_WIDTH must be positive (got ${barMaxWidth})`);
  }

  return {
    timeZone: TIME_ZONE,
    outputDir: resolve(env.SPOT_OUTPUT_DIR || process.cwd()),
    feeds: {
      hour: {
        url: LATEST_PRICES_URL.hour,
        cacheFile: resolve(cacheDir, 'price_data_latest.json'),
      },
      quarter: {
        url: LATEST_PRICES_URL.quarter,
        cacheFile: resolve(cacheDir, 'price_data_latest_15min.json'),
      },
    },
    barMaxWidth,
    showHistory: readBoolean(env, 'SPOT_SHOW_HISTORY', false),
    forceFetch: readBoolean(env, 'SPOT_FORCE_FETCH', false),
    refreshHour,
    minHorizonHours: readNumber(env, 'SPOT_MIN_HORIZON_HOURS', 20),
    splitThreshold: readNumber(env, 'SPOT_SPLIT_THRESHOLD', 24),
    blockOrder: readBlockOrder(env),
    showQuarterRange: readBoolean(env, 'SPOT_QUARTER_RANGE', true),
    vatLabel: env.SPOT_VAT_LABEL || 'alv. 25,5 %',
  };
}
