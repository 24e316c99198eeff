// lib/generate.ts

import type { SiteConfig } from './config';
import { cutoffFor } from './format';
import { loadPrices } from './loader';
import type { Fetcher } from './porssisahko';
import { renderPage } from './render';
import { buildPriceTable } from './table';
import { ALL_VARIANTS, pageFileName } from './variants';
import type { PriceRecord, PriceTable, Resolution } from './types';

export type GeneratedPage = {
  fileName: string;
  html: string;
};

async function loadResolution(
  config: SiteConfig,
  resolution: Resolution,
  now: Date,
  fetcher?: Fetcher
): Promise<PriceRecord[]> {
  const feed = config.feeds[resolution];
  return loadPrices({
    url: feed.url,
    cacheFile: feed.cacheFile,
    now,
    forceFetch: config.forceFetch,
    refreshHour: config.refreshHour,
    minHorizonHours: config.minHorizonHours,
    timeZone: config.timeZone,
    fetcher,
  });
}

export async function generatePages(
  config: SiteConfig,
  now: Date,
  fetcher?: Fetcher
): Promise<GeneratedPage[]> {
  const hourly = await loadResolution(config, 'hour', now, fetcher);
  const quarterly = await loadResolution(config, 'quarter', now, fetcher);

  const common = {
    showHistory: config.showHistory,
    barMaxWidth: config.barMaxWidth,
    vatLabel: config.vatLabel,
    timeZone: config.timeZone,
  };

  const tables: Record<Resolution, PriceTable> = {
    hour: buildPriceTable(hourly, {
      ...common,
      cutoff: cutoffFor(now, 'hour'),
      resolution: 'hour',
      quarterPrices: config.showQuarterRange ? quarterly : undefined,
    }),
    quarter: buildPriceTable(quarterly, {
      ...common,
      cutoff: cutoffFor(now, 'quarter'),
      resolution: 'quarter',
    }),
  };

  return ALL_VARIANTS.map((variant) => ({
    fileName: pageFileName(variant),
    html: renderPage({
      table: tables[variant.resolution],
      variant,
      splitThreshold: config.splitThreshold,
      blockOrder: config.blockOrder,
    }),
  }));
}
